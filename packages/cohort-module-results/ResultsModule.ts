import { inject, injectable } from 'inversify';
import { Context } from '../cohort-utils/Context';
import { createLogger } from '../cohort-log/createLogger';
import { AssessmentDescriptor, ResultSummarizer, SummarizerFactory } from './summarizers/ResultSummarizer';
import { SummarizerRegistry } from './summarizers/SummarizerRegistry';

const log = createLogger('results');

@injectable()
export class ResultsModule {
    @inject('SummarizerRegistry')
    private readonly registry!: SummarizerRegistry;

    start = async () => {
        // Nothing to do
    }

    registerSummarizer(frameworkIdentifier: string, factory: SummarizerFactory) {
        this.registry.register(frameworkIdentifier, factory);
    }

    createSummarizer(ctx: Context, assessment: AssessmentDescriptor, config: unknown): ResultSummarizer | null {
        let res = this.registry.create(assessment, config);
        if (!res) {
            log.log(ctx, 'No summarizer for assessment ' + assessment.identifier + ' with framework ' + assessment.frameworkIdentifier);
        }
        return res;
    }
}
