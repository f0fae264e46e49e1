import * as t from 'io-ts';
import { nullable, StringSet } from './codecs';

export const WorkerConfigItem = t.intersection([
    t.type({
        burstDurationDays: t.number,
        earlyLateCutoffDays: t.number,
        notificationBlackoutDaysFromStart: t.number,
        notificationBlackoutDaysFromEnd: t.number,
        numActivitiesToCompleteBurst: t.number,
        numMissedConsecutiveDaysToNotify: t.number,
        numMissedDaysToNotify: t.number
    }),
    t.partial({
        appUrl: nullable(t.string),
        burstStartEventIdSet: nullable(StringSet),
        burstTaskId: nullable(t.string),
        engagementSurveyGuid: nullable(t.string),
        excludedDataGroupSet: nullable(StringSet),
        missedCumulativeActivitiesMessagesList: nullable(t.array(t.string)),
        missedEarlyActivitiesMessagesList: nullable(t.array(t.string)),
        missedLaterActivitiesMessagesList: nullable(t.array(t.string)),
        preburstMessagesByDataGroup: nullable(t.record(t.string, t.array(t.string)))
    })
]);

/**
 * Per-study notification tuning. Absent sets, lists and maps are read as empty.
 */
export interface WorkerConfig {
    readonly appUrl: string | null;
    readonly burstDurationDays: number;
    readonly burstStartEventIdSet: ReadonlySet<string>;
    readonly burstTaskId: string | null;
    readonly earlyLateCutoffDays: number;
    readonly engagementSurveyGuid: string | null;
    readonly excludedDataGroupSet: ReadonlySet<string>;
    readonly missedCumulativeActivitiesMessagesList: readonly string[];
    readonly missedEarlyActivitiesMessagesList: readonly string[];
    readonly missedLaterActivitiesMessagesList: readonly string[];
    readonly notificationBlackoutDaysFromStart: number;
    readonly notificationBlackoutDaysFromEnd: number;
    readonly numActivitiesToCompleteBurst: number;
    readonly numMissedConsecutiveDaysToNotify: number;
    readonly numMissedDaysToNotify: number;
    readonly preburstMessagesByDataGroup: { readonly [dataGroup: string]: readonly string[] };
}

export function toWorkerConfig(item: t.TypeOf<typeof WorkerConfigItem>): WorkerConfig {
    return Object.freeze({
        appUrl: item.appUrl ?? null,
        burstDurationDays: item.burstDurationDays,
        burstStartEventIdSet: item.burstStartEventIdSet ?? new Set<string>(),
        burstTaskId: item.burstTaskId ?? null,
        earlyLateCutoffDays: item.earlyLateCutoffDays,
        engagementSurveyGuid: item.engagementSurveyGuid ?? null,
        excludedDataGroupSet: item.excludedDataGroupSet ?? new Set<string>(),
        missedCumulativeActivitiesMessagesList: item.missedCumulativeActivitiesMessagesList ?? [],
        missedEarlyActivitiesMessagesList: item.missedEarlyActivitiesMessagesList ?? [],
        missedLaterActivitiesMessagesList: item.missedLaterActivitiesMessagesList ?? [],
        notificationBlackoutDaysFromStart: item.notificationBlackoutDaysFromStart,
        notificationBlackoutDaysFromEnd: item.notificationBlackoutDaysFromEnd,
        numActivitiesToCompleteBurst: item.numActivitiesToCompleteBurst,
        numMissedConsecutiveDaysToNotify: item.numMissedConsecutiveDaysToNotify,
        numMissedDaysToNotify: item.numMissedDaysToNotify,
        preburstMessagesByDataGroup: item.preburstMessagesByDataGroup ?? {}
    });
}
