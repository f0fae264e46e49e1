import * as t from 'io-ts';
import { nullable } from './codecs';

export const NotificationTypeCodec = t.keyof({
    CUMULATIVE: null,
    EARLY: null,
    LATE: null,
    PRE_BURST: null,
    UNKNOWN: null
});

export type NotificationType = t.TypeOf<typeof NotificationTypeCodec>;

export interface UserNotification {
    userId: string;
    time: number;
    message: string;
    type: NotificationType;
}

export const UserNotificationItem = t.intersection([
    t.type({
        userId: t.string,
        notificationTime: t.number
    }),
    t.partial({
        message: nullable(t.string),
        notificationType: nullable(t.string)
    })
]);
