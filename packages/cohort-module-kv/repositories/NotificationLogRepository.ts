import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { isBlank } from '../../cohort-utils/misc';
import { decodeOrThrow } from '../../cohort-errors/decode';
import { DocumentStore } from '../store/DocumentStore';
import { NotificationType, NotificationTypeCodec, UserNotification, UserNotificationItem } from '../model/UserNotification';

const KEY_USER_ID = 'userId';
const KEY_NOTIFICATION_TIME = 'notificationTime';

@injectable()
export class NotificationLogRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables
    ) {
        this.store = store;
        this.tables = tables;
    }

    /**
     * Most recent notification sent to the user, or null if the user was never notified.
     */
    async getLastNotification(ctx: Context, userId: string): Promise<UserNotification | null> {
        let items = await this.store.query(ctx, this.tables.notificationLog, {
            hashKey: { name: KEY_USER_ID, value: userId },
            descending: true,
            limit: 1
        });
        if (items.length === 0) {
            return null;
        }
        let item = decodeOrThrow(UserNotificationItem, items[0], 'notification log entry');

        // Entries written before notification types existed have none
        let type: NotificationType = 'UNKNOWN';
        if (!isBlank(item.notificationType)) {
            type = decodeOrThrow(NotificationTypeCodec, item.notificationType, 'notification type');
        }

        return {
            userId: item.userId,
            time: item.notificationTime,
            message: item.message || '',
            type
        };
    }

    /**
     * Appends a log entry keyed by user and time. An existing entry with the same key is never overwritten.
     */
    async appendNotification(ctx: Context, notification: UserNotification) {
        await this.store.putItem(ctx, this.tables.notificationLog, {
            [KEY_USER_ID]: notification.userId,
            [KEY_NOTIFICATION_TIME]: notification.time,
            message: notification.message,
            notificationType: notification.type
        }, { ifNotExists: KEY_USER_ID });
    }
}
