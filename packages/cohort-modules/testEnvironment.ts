import 'reflect-metadata';
import { container } from './Modules.container';
import { createNamedContext } from '../cohort-utils/Context';
import { Clock, ManualClock } from '../cohort-utils/timer';
import { createLogger } from '../cohort-log/createLogger';
import { StoreTables } from '../cohort-config/Config';
import { DocumentStore } from '../cohort-module-kv/store/DocumentStore';
import { InMemoryDocumentStore } from '../cohort-module-kv/store/DocumentStore.mock';
import { createTestDocumentStore, testTables } from '../cohort-module-kv/store/testTables';
import { loadKeyValueModule } from '../cohort-module-kv/KeyValueModule.container';
import { loadResultsModule } from '../cohort-module-results/ResultsModule.container';
import { WarehouseClient } from '../cohort-module-warehouse/client/WarehouseClient';
import { WarehouseClientMock } from '../cohort-module-warehouse/client/WarehouseClient.mock';
import { loadWarehouseModule } from '../cohort-module-warehouse/WarehouseModule.container';

const logger = createLogger('environment');

export interface TestEnvironment {
    store: InMemoryDocumentStore;
    warehouse: WarehouseClientMock;
    clock: ManualClock;
}

export async function testEnvironmentStart(name: string, overrides: Partial<TestEnvironment> = {}): Promise<TestEnvironment> {
    let ctx = createNamedContext('test-' + name);
    logger.log(ctx, 'Starting');

    // Reset container
    container.snapshot();
    container.unbindAll();

    let env: TestEnvironment = {
        store: overrides.store || createTestDocumentStore(),
        warehouse: overrides.warehouse || new WarehouseClientMock(),
        clock: overrides.clock || new ManualClock(1000)
    };
    container.bind<DocumentStore>('DocumentStore').toConstantValue(env.store);
    container.bind<StoreTables>('StoreTables').toConstantValue(testTables);
    container.bind<Clock>('Clock').toConstantValue(env.clock);
    container.bind<WarehouseClient>('WarehouseClient').toConstantValue(env.warehouse);

    loadKeyValueModule();
    loadResultsModule();
    loadWarehouseModule();
    return env;
}

export async function testEnvironmentEnd() {
    container.restore();
}
