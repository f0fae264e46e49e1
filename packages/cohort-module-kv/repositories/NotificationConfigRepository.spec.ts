import { createNamedContext } from '../../cohort-utils/Context';
import { ManualClock } from '../../cohort-utils/timer';
import { NotFoundError } from '../../cohort-errors/NotFoundError';
import { DeserializationError } from '../../cohort-errors/DeserializationError';
import { createTestDocumentStore, testTables } from '../store/testTables';
import { NOTIFICATION_CONFIG_TTL, NotificationConfigRepository } from './NotificationConfigRepository';

const configItem = {
    studyId: 'study-1',
    appUrl: 'https://app.test/study-1',
    burstDurationDays: 9,
    burstStartEventIdSet: new Set(['enrollment', 'custom:burst']),
    burstTaskId: 'burst-task',
    earlyLateCutoffDays: 5,
    engagementSurveyGuid: 'survey-guid',
    excludedDataGroupSet: new Set(['test_user']),
    missedCumulativeActivitiesMessagesList: ['cumulative-1'],
    missedEarlyActivitiesMessagesList: ['early-1', 'early-2'],
    missedLaterActivitiesMessagesList: ['later-1'],
    notificationBlackoutDaysFromStart: 3,
    notificationBlackoutDaysFromEnd: 1,
    numActivitiesToCompleteBurst: 6,
    numMissedConsecutiveDaysToNotify: 2,
    numMissedDaysToNotify: 4,
    preburstMessagesByDataGroup: { groupA: ['pre-a'], groupB: ['pre-b1', 'pre-b2'] }
};

describe('NotificationConfigRepository', () => {
    const ctx = createNamedContext('test');

    it('should read notification config', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.notificationConfig, configItem);
        let repo = new NotificationConfigRepository(store, testTables, new ManualClock());

        let config = await repo.getNotificationConfig(ctx, 'study-1');

        expect(config.appUrl).toBe('https://app.test/study-1');
        expect(config.burstDurationDays).toBe(9);
        expect([...config.burstStartEventIdSet].sort()).toEqual(['custom:burst', 'enrollment']);
        expect(config.burstTaskId).toBe('burst-task');
        expect(config.earlyLateCutoffDays).toBe(5);
        expect(config.engagementSurveyGuid).toBe('survey-guid');
        expect([...config.excludedDataGroupSet]).toEqual(['test_user']);
        expect(config.missedCumulativeActivitiesMessagesList).toEqual(['cumulative-1']);
        expect(config.missedEarlyActivitiesMessagesList).toEqual(['early-1', 'early-2']);
        expect(config.missedLaterActivitiesMessagesList).toEqual(['later-1']);
        expect(config.notificationBlackoutDaysFromStart).toBe(3);
        expect(config.notificationBlackoutDaysFromEnd).toBe(1);
        expect(config.numActivitiesToCompleteBurst).toBe(6);
        expect(config.numMissedConsecutiveDaysToNotify).toBe(2);
        expect(config.numMissedDaysToNotify).toBe(4);
        expect(config.preburstMessagesByDataGroup).toEqual({ groupA: ['pre-a'], groupB: ['pre-b1', 'pre-b2'] });
    });

    it('should default missing collections to empty', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.notificationConfig, {
            studyId: 'study-2',
            burstDurationDays: 1,
            earlyLateCutoffDays: 1,
            notificationBlackoutDaysFromStart: 0,
            notificationBlackoutDaysFromEnd: 0,
            numActivitiesToCompleteBurst: 1,
            numMissedConsecutiveDaysToNotify: 1,
            numMissedDaysToNotify: 1
        });
        let repo = new NotificationConfigRepository(store, testTables, new ManualClock());

        let config = await repo.getNotificationConfig(ctx, 'study-2');

        expect(config.appUrl).toBeNull();
        expect(config.burstStartEventIdSet.size).toBe(0);
        expect(config.excludedDataGroupSet.size).toBe(0);
        expect(config.missedEarlyActivitiesMessagesList).toEqual([]);
        expect(config.preburstMessagesByDataGroup).toEqual({});
    });

    it('should fail when config is missing', async () => {
        let repo = new NotificationConfigRepository(createTestDocumentStore(), testTables, new ManualClock());
        await expect(repo.getNotificationConfig(ctx, 'missing')).rejects.toThrow(NotFoundError);
    });

    it('should fail on malformed config', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.notificationConfig, { ...configItem, burstDurationDays: 'nine' });
        let repo = new NotificationConfigRepository(store, testTables, new ManualClock());
        await expect(repo.getNotificationConfig(ctx, 'study-1')).rejects.toThrow(DeserializationError);
    });

    it('should cache config for five minutes', async () => {
        let store = createTestDocumentStore();
        let clock = new ManualClock(10000);
        await store.putItem(ctx, testTables.notificationConfig, configItem);
        let repo = new NotificationConfigRepository(store, testTables, clock);
        const reads = () => store.calls.filter((c) => c.op === 'get').length;

        await repo.getNotificationConfig(ctx, 'study-1');
        await store.putItem(ctx, testTables.notificationConfig, { ...configItem, burstDurationDays: 14 });

        clock.advance(NOTIFICATION_CONFIG_TTL - 1);
        expect((await repo.getNotificationConfig(ctx, 'study-1')).burstDurationDays).toBe(9);
        expect(reads()).toBe(1);

        clock.advance(1);
        expect((await repo.getNotificationConfig(ctx, 'study-1')).burstDurationDays).toBe(14);
        expect(reads()).toBe(2);
    });

    it('should reload after invalidation', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.notificationConfig, configItem);
        let repo = new NotificationConfigRepository(store, testTables, new ManualClock());

        await repo.getNotificationConfig(ctx, 'study-1');
        await store.putItem(ctx, testTables.notificationConfig, { ...configItem, numMissedDaysToNotify: 7 });
        repo.invalidate('study-1');

        expect((await repo.getNotificationConfig(ctx, 'study-1')).numMissedDaysToNotify).toBe(7);
    });

    it('should not serve a load started before invalidation', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.notificationConfig, configItem);
        let repo = new NotificationConfigRepository(store, testTables, new ManualClock());

        let inFlight = repo.getNotificationConfig(ctx, 'study-1');
        await store.putItem(ctx, testTables.notificationConfig, { ...configItem, burstDurationDays: 14 });
        repo.invalidate('study-1');

        expect((await repo.getNotificationConfig(ctx, 'study-1')).burstDurationDays).toBe(14);
        expect((await inFlight).burstDurationDays).toBe(9);
        expect((await repo.getNotificationConfig(ctx, 'study-1')).burstDurationDays).toBe(14);
    });
});
