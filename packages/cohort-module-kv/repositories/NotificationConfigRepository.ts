import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { ExpiringCache } from '../../cohort-utils/ExpiringCache';
import { Clock } from '../../cohort-utils/timer';
import { NotFoundError } from '../../cohort-errors/NotFoundError';
import { decodeOrThrow } from '../../cohort-errors/decode';
import { createLogger } from '../../cohort-log/createLogger';
import { DocumentStore } from '../store/DocumentStore';
import { toWorkerConfig, WorkerConfig, WorkerConfigItem } from '../model/WorkerConfig';

export const NOTIFICATION_CONFIG_TTL = 5 * 60 * 1000;

const log = createLogger('notification-config');

@injectable()
export class NotificationConfigRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;
    private readonly cache: ExpiringCache<WorkerConfig>;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables,
        @inject('Clock') clock: Clock
    ) {
        this.store = store;
        this.tables = tables;
        this.cache = new ExpiringCache<WorkerConfig>({ timeout: NOTIFICATION_CONFIG_TTL, clock });
    }

    /**
     * Notification config of the study, cached for five minutes. Throws NotFoundError if the study has none.
     */
    async getNotificationConfig(ctx: Context, studyId: string): Promise<WorkerConfig> {
        return this.cache.getOrLoad(studyId, async () => {
            log.debug(ctx, 'Loading notification config for ' + studyId);
            let item = await this.store.getItem(ctx, this.tables.notificationConfig, { studyId });
            if (!item) {
                throw new NotFoundError('Notification config not found for study ' + studyId);
            }
            return toWorkerConfig(decodeOrThrow(WorkerConfigItem, item, 'notification config for study ' + studyId));
        });
    }

    invalidate(studyId: string) {
        this.cache.delete(studyId);
    }
}
