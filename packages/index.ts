export { Context, createNamedContext } from './cohort-utils/Context';
export { Clock, ManualClock, systemClock } from './cohort-utils/timer';
export { createLogger } from './cohort-log/createLogger';
export { withLogContext, withLogData, withLogDisabled } from './cohort-log/withLogContext';
export { SLog } from './cohort-log/SLog';
export { Config, loadConfig, Configuration, StoreTables } from './cohort-config/Config';
export { NotFoundError } from './cohort-errors/NotFoundError';
export { DeserializationError } from './cohort-errors/DeserializationError';
export { PreconditionFailedError } from './cohort-errors/PreconditionFailedError';
export { WarehouseError } from './cohort-errors/WarehouseError';
export { DuplicateItemError } from './cohort-errors/DuplicateItemError';
export { container } from './cohort-modules/Modules.container';
export { Modules } from './cohort-modules/Modules';
export { loadAllModules, startAllModules } from './cohort-modules/loadAllModules';
export { KeyValueModule } from './cohort-module-kv/KeyValueModule';
export { DocumentStore } from './cohort-module-kv/store/DocumentStore';
export { WorkerConfig } from './cohort-module-kv/model/WorkerConfig';
export { UserNotification, NotificationType } from './cohort-module-kv/model/UserNotification';
export { StudyInfo } from './cohort-module-kv/model/StudyInfo';
export { UploadSchema, UploadSchemaKey } from './cohort-module-kv/model/UploadSchema';
export { ResultsModule } from './cohort-module-results/ResultsModule';
export { ResultSummarizer, SummarizerFactory, AssessmentDescriptor } from './cohort-module-results/summarizers/ResultSummarizer';
export { AssessmentResultSummarizer, ASSESSMENT_FRAMEWORK_IDENTIFIER } from './cohort-module-results/summarizers/AssessmentResultSummarizer';
export { AnswerColumn } from './cohort-module-results/model/AssessmentConfig';
export { WarehouseModule, ParticipantVersionTables } from './cohort-module-warehouse/WarehouseModule';
export { WarehouseClient, ColumnModel, PartialRow } from './cohort-module-warehouse/client/WarehouseClient';
export { RestWarehouseClient } from './cohort-module-warehouse/client/RestWarehouseClient';
export { ParticipantVersion, decodeParticipantVersion } from './cohort-module-warehouse/model/ParticipantVersion';
