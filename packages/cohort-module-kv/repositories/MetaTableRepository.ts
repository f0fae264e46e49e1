import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { DocumentStore } from '../store/DocumentStore';

const ATTR_TABLE_NAME = 'tableName';
const ATTR_TABLE_ID = 'tableId';
const SUFFIX_DEFAULT = '-default';

/**
 * Meta tables of a study, such as the default (schemaless) record table.
 */
@injectable()
export class MetaTableRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables
    ) {
        this.store = store;
        this.tables = tables;
    }

    async getDefaultTableForStudy(ctx: Context, studyId: string): Promise<string | null> {
        let item = await this.store.getItem(ctx, this.tables.metaTable, { [ATTR_TABLE_NAME]: studyId + SUFFIX_DEFAULT });
        if (!item) {
            // Not created yet
            return null;
        }
        let tableId = item[ATTR_TABLE_ID];
        return typeof tableId === 'string' ? tableId : null;
    }

    async deleteDefaultTableForStudy(ctx: Context, studyId: string) {
        await this.store.deleteItem(ctx, this.tables.metaTable, { [ATTR_TABLE_NAME]: studyId + SUFFIX_DEFAULT });
    }
}
