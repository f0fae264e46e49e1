import { StoreTables } from '../../cohort-config/Config';
import { InMemoryDocumentStore } from './DocumentStore.mock';

export const testTables: StoreTables = {
    notificationConfig: 'test-NotificationConfig',
    notificationLog: 'test-NotificationLog',
    study: 'test-Study',
    schemaTableMap: 'test-SchemaTableMap',
    metaTable: 'test-MetaTables',
    surveyTables: 'test-SurveyTables',
    uploadSchema: 'test-UploadSchema',
    uploadSchemaStudyIndex: 'studyId-index',
    workerLog: 'test-WorkerLog'
};

/**
 * In-memory store with the key schemas of all tables.
 */
export function createTestDocumentStore(tables: StoreTables = testTables) {
    return new InMemoryDocumentStore()
        .defineTable(tables.notificationConfig, { hashKey: 'studyId' })
        .defineTable(tables.notificationLog, { hashKey: 'userId', rangeKey: 'notificationTime' })
        .defineTable(tables.study, { hashKey: 'identifier' })
        .defineTable(tables.schemaTableMap, { hashKey: 'schemaKey' })
        .defineTable(tables.metaTable, { hashKey: 'tableName' })
        .defineTable(tables.surveyTables, { hashKey: 'studyId' })
        .defineTable(tables.uploadSchema, {
            hashKey: 'key',
            rangeKey: 'revision',
            indexes: {
                [tables.uploadSchemaStudyIndex]: { hashKey: 'studyId', projection: [] }
            }
        })
        .defineTable(tables.workerLog, { hashKey: 'workerId', rangeKey: 'finishTime' });
}
