import { AssessmentDescriptor, ResultSummarizer, SummarizerFactory } from './ResultSummarizer';
import { ASSESSMENT_FRAMEWORK_IDENTIFIER, AssessmentResultSummarizer } from './AssessmentResultSummarizer';

export class SummarizerRegistry {
    private readonly factories = new Map<string, SummarizerFactory>();

    register(frameworkIdentifier: string, factory: SummarizerFactory) {
        if (this.factories.has(frameworkIdentifier)) {
            throw Error('Summarizer for ' + frameworkIdentifier + ' is already registered');
        }
        this.factories.set(frameworkIdentifier, factory);
        return this;
    }

    has(frameworkIdentifier: string) {
        return this.factories.has(frameworkIdentifier);
    }

    /**
     * Summarizer for the assessment's framework, null if no framework or none registered.
     */
    create(assessment: AssessmentDescriptor, config: unknown): ResultSummarizer | null {
        if (!assessment.frameworkIdentifier) {
            return null;
        }
        let factory = this.factories.get(assessment.frameworkIdentifier);
        return factory ? factory(assessment, config) : null;
    }
}

export function createDefaultSummarizerRegistry() {
    return new SummarizerRegistry()
        .register(ASSESSMENT_FRAMEWORK_IDENTIFIER, (assessment, config) => new AssessmentResultSummarizer(assessment, config));
}
