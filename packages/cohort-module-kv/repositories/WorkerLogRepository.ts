import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { Clock } from '../../cohort-utils/timer';
import { DocumentStore } from '../store/DocumentStore';

/**
 * Worker run log. Integration tests watch it to know when a worker has finished.
 */
@injectable()
export class WorkerLogRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;
    private readonly clock: Clock;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables,
        @inject('Clock') clock: Clock
    ) {
        this.store = store;
        this.tables = tables;
        this.clock = clock;
    }

    async writeWorkerLog(ctx: Context, workerId: string, tag: string) {
        await this.store.putItem(ctx, this.tables.workerLog, {
            workerId,
            finishTime: this.clock.now(),
            tag
        });
    }
}
