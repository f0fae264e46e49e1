import { inject, injectable } from 'inversify';
import { Context } from '../cohort-utils/Context';
import { MetaTableRepository } from './repositories/MetaTableRepository';
import { NotificationConfigRepository } from './repositories/NotificationConfigRepository';
import { NotificationLogRepository } from './repositories/NotificationLogRepository';
import { StudyRepository } from './repositories/StudyRepository';
import { SurveyTableRepository } from './repositories/SurveyTableRepository';
import { SchemaTableRepository } from './repositories/SchemaTableRepository';
import { WorkerLogRepository } from './repositories/WorkerLogRepository';
import { UserNotification } from './model/UserNotification';
import { UploadSchemaKey } from './model/UploadSchema';

@injectable()
export class KeyValueModule {
    @inject('MetaTableRepository')
    private readonly meta!: MetaTableRepository;

    @inject('NotificationConfigRepository')
    private readonly notificationConfigs!: NotificationConfigRepository;

    @inject('NotificationLogRepository')
    private readonly notificationLog!: NotificationLogRepository;

    @inject('StudyRepository')
    private readonly studies!: StudyRepository;

    @inject('SurveyTableRepository')
    private readonly surveyTables!: SurveyTableRepository;

    @inject('SchemaTableRepository')
    private readonly schemaTables!: SchemaTableRepository;

    @inject('WorkerLogRepository')
    private readonly workerLog!: WorkerLogRepository;

    start = async () => {
        // Nothing to do
    }

    //
    // Meta tables
    //

    getDefaultTableForStudy(ctx: Context, studyId: string) {
        return this.meta.getDefaultTableForStudy(ctx, studyId);
    }

    deleteDefaultTableForStudy(ctx: Context, studyId: string) {
        return this.meta.deleteDefaultTableForStudy(ctx, studyId);
    }

    //
    // Notifications
    //

    getNotificationConfig(ctx: Context, studyId: string) {
        return this.notificationConfigs.getNotificationConfig(ctx, studyId);
    }

    invalidateNotificationConfig(studyId: string) {
        this.notificationConfigs.invalidate(studyId);
    }

    getLastNotification(ctx: Context, userId: string) {
        return this.notificationLog.getLastNotification(ctx, userId);
    }

    appendNotification(ctx: Context, notification: UserNotification) {
        return this.notificationLog.appendNotification(ctx, notification);
    }

    //
    // Studies
    //

    getStudy(ctx: Context, studyId: string) {
        return this.studies.getStudy(ctx, studyId);
    }

    //
    // Survey tables
    //

    getSurveyTableIds(ctx: Context, studyId: string) {
        return this.surveyTables.getSurveyTableIds(ctx, studyId);
    }

    addSurveyTableMapping(ctx: Context, studyId: string, tableId: string) {
        return this.surveyTables.addSurveyTableMapping(ctx, studyId, tableId);
    }

    removeSurveyTableMapping(ctx: Context, studyId: string, tableId: string) {
        return this.surveyTables.removeSurveyTableMapping(ctx, studyId, tableId);
    }

    //
    // Schema tables
    //

    getTableIdsForStudy(ctx: Context, studyId: string) {
        return this.schemaTables.getTableIdsForStudy(ctx, studyId);
    }

    setTableIdMapping(ctx: Context, schemaKey: UploadSchemaKey, tableId: string) {
        return this.schemaTables.setTableIdMapping(ctx, schemaKey, tableId);
    }

    removeTableIdMapping(ctx: Context, schemaKey: UploadSchemaKey) {
        return this.schemaTables.removeTableIdMapping(ctx, schemaKey);
    }

    //
    // Worker log
    //

    writeWorkerLog(ctx: Context, workerId: string, tag: string) {
        return this.workerLog.writeWorkerLog(ctx, workerId, tag);
    }
}
