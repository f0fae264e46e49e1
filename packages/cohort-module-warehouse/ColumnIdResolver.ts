import { inject, injectable } from 'inversify';
import { Context } from '../cohort-utils/Context';
import { ExpiringCache } from '../cohort-utils/ExpiringCache';
import { createLogger } from '../cohort-log/createLogger';
import { WarehouseClient } from './client/WarehouseClient';

const log = createLogger('column-ids');

/**
 * Column name to column ID lookup. Table columns don't change after creation, so results are kept forever.
 */
@injectable()
export class ColumnIdResolver {
    private readonly client: WarehouseClient;
    private readonly cache = new ExpiringCache<ReadonlyMap<string, string>>({ timeout: 'forever' });

    constructor(@inject('WarehouseClient') client: WarehouseClient) {
        this.client = client;
    }

    resolveColumnIds(ctx: Context, tableId: string): Promise<ReadonlyMap<string, string>> {
        return this.cache.getOrLoad(tableId, async () => {
            let columns = await this.client.getColumnModels(ctx, tableId);
            log.debug(ctx, 'Loaded ' + columns.length + ' columns of ' + tableId);
            return new Map(columns.map((c) => [c.name, c.id]));
        });
    }
}
