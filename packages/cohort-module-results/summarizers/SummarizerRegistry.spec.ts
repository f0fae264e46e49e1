import { Context } from '../../cohort-utils/Context';
import { AssessmentDescriptor, ResultSummarizer } from './ResultSummarizer';
import { ASSESSMENT_FRAMEWORK_IDENTIFIER, AssessmentResultSummarizer } from './AssessmentResultSummarizer';
import { createDefaultSummarizerRegistry } from './SummarizerRegistry';

class CsvSummarizer implements ResultSummarizer {
    readonly frameworkIdentifier = 'test.csv';
    readonly resultFilename = 'result.csv';

    canSummarize(assessment: AssessmentDescriptor) {
        return assessment.frameworkIdentifier === this.frameworkIdentifier;
    }

    summarizeResults(ctx: Context, result: string) {
        return new Map(result.split(',').map((v, i): [string, string] => ['col' + i, v]));
    }

    getColumnNames() {
        return [];
    }
}

describe('SummarizerRegistry', () => {
    it('should dispatch by framework', () => {
        let registry = createDefaultSummarizerRegistry();
        let summarizer = registry.create({ identifier: 'a', frameworkIdentifier: ASSESSMENT_FRAMEWORK_IDENTIFIER }, null);
        expect(summarizer).toBeInstanceOf(AssessmentResultSummarizer);
    });

    it('should return null for unknown or missing framework', () => {
        let registry = createDefaultSummarizerRegistry();
        expect(registry.create({ identifier: 'a', frameworkIdentifier: 'test.csv' }, null)).toBeNull();
        expect(registry.create({ identifier: 'a' }, null)).toBeNull();
    });

    it('should accept new frameworks', () => {
        let registry = createDefaultSummarizerRegistry().register('test.csv', () => new CsvSummarizer());
        let summarizer = registry.create({ identifier: 'a', frameworkIdentifier: 'test.csv' }, null);
        expect(summarizer).toBeInstanceOf(CsvSummarizer);
        expect(registry.has('test.csv')).toBe(true);
    });

    it('should reject duplicate registration', () => {
        expect(() => createDefaultSummarizerRegistry().register(ASSESSMENT_FRAMEWORK_IDENTIFIER, () => new CsvSummarizer()))
            .toThrow('Summarizer for health.bridgedigital.assessment is already registered');
    });
});
