import { container } from '../cohort-modules/Modules.container';
import { ResultsModule } from './ResultsModule';
import { createDefaultSummarizerRegistry, SummarizerRegistry } from './summarizers/SummarizerRegistry';

export function loadResultsModule() {
    container.bind<SummarizerRegistry>('SummarizerRegistry').toDynamicValue(createDefaultSummarizerRegistry).inSingletonScope();
    container.bind(ResultsModule).toSelf().inSingletonScope();
}
