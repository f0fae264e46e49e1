import { container } from '../cohort-modules/Modules.container';
import { KeyValueModule } from './KeyValueModule';
import { MetaTableRepository } from './repositories/MetaTableRepository';
import { NotificationConfigRepository } from './repositories/NotificationConfigRepository';
import { NotificationLogRepository } from './repositories/NotificationLogRepository';
import { StudyRepository } from './repositories/StudyRepository';
import { SurveyTableRepository } from './repositories/SurveyTableRepository';
import { SchemaTableRepository } from './repositories/SchemaTableRepository';
import { WorkerLogRepository } from './repositories/WorkerLogRepository';

export function loadKeyValueModule() {
    container.bind('MetaTableRepository').to(MetaTableRepository).inSingletonScope();
    container.bind('NotificationConfigRepository').to(NotificationConfigRepository).inSingletonScope();
    container.bind('NotificationLogRepository').to(NotificationLogRepository).inSingletonScope();
    container.bind('StudyRepository').to(StudyRepository).inSingletonScope();
    container.bind('SurveyTableRepository').to(SurveyTableRepository).inSingletonScope();
    container.bind('SchemaTableRepository').to(SchemaTableRepository).inSingletonScope();
    container.bind('WorkerLogRepository').to(WorkerLogRepository).inSingletonScope();
    container.bind(KeyValueModule).toSelf().inSingletonScope();
}
