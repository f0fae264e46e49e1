import 'reflect-metadata';
import { container } from './Modules.container';
import { Context } from '../cohort-utils/Context';
import { Clock, systemClock } from '../cohort-utils/timer';
import { createLogger } from '../cohort-log/createLogger';
import { Config, StoreTables } from '../cohort-config/Config';
import { DocumentStore } from '../cohort-module-kv/store/DocumentStore';
import { createDynamoDocumentStore } from '../cohort-module-kv/store/DynamoDocumentStore';
import { loadKeyValueModule } from '../cohort-module-kv/KeyValueModule.container';
import { KeyValueModule } from '../cohort-module-kv/KeyValueModule';
import { loadResultsModule } from '../cohort-module-results/ResultsModule.container';
import { ResultsModule } from '../cohort-module-results/ResultsModule';
import { WarehouseClient } from '../cohort-module-warehouse/client/WarehouseClient';
import { RestWarehouseClient } from '../cohort-module-warehouse/client/RestWarehouseClient';
import { loadWarehouseModule } from '../cohort-module-warehouse/WarehouseModule.container';
import { WarehouseModule } from '../cohort-module-warehouse/WarehouseModule';

const logger = createLogger('starting');

export async function loadAllModules(ctx: Context) {
    logger.log(ctx, 'Connecting to document store in ' + Config.store.region);
    container.bind<DocumentStore>('DocumentStore')
        .toConstantValue(createDynamoDocumentStore(Config.store));
    container.bind<StoreTables>('StoreTables')
        .toConstantValue(Config.store.tables);
    container.bind<Clock>('Clock')
        .toConstantValue(systemClock);

    logger.log(ctx, 'Warehouse endpoint: ' + Config.warehouse.endpoint);
    container.bind<WarehouseClient>('WarehouseClient')
        .toConstantValue(new RestWarehouseClient({
            endpoint: Config.warehouse.endpoint,
            accessToken: Config.warehouse.accessToken,
            retry: Config.warehouse.retry || undefined
        }));

    logger.log(ctx, 'Loading modules...');
    loadKeyValueModule();
    loadResultsModule();
    loadWarehouseModule();
    logger.log(ctx, 'Modules loaded');
}

export async function startAllModules(ctx: Context) {
    logger.log(ctx, 'Starting module: KeyValue');
    await container.get(KeyValueModule).start();
    logger.log(ctx, 'Starting module: Results');
    await container.get(ResultsModule).start();
    logger.log(ctx, 'Starting module: Warehouse');
    await container.get(WarehouseModule).start();
    logger.log(ctx, 'Modules started');
}
