import { Context } from '../../cohort-utils/Context';
import { PreconditionFailedError } from '../../cohort-errors/PreconditionFailedError';
import { decodeOrThrow, parseJsonOrThrow } from '../../cohort-errors/decode';
import { createLogger } from '../../cohort-log/createLogger';
import { ResultNodeCodec } from '../model/AssessmentResult';
import { AnswerColumn, ConfigNodeCodec } from '../model/AssessmentConfig';
import { flattenAnswers } from '../flatten/flattenAnswers';
import { flattenAnswerColumns } from '../flatten/flattenAnswerColumns';
import { AssessmentDescriptor, ResultSummarizer } from './ResultSummarizer';

export const ASSESSMENT_FRAMEWORK_IDENTIFIER = 'health.bridgedigital.assessment';

const log = createLogger('assessment-results');

export class AssessmentResultSummarizer implements ResultSummarizer {
    readonly frameworkIdentifier = ASSESSMENT_FRAMEWORK_IDENTIFIER;
    readonly resultFilename = 'assessmentResult.json';

    private readonly assessment: AssessmentDescriptor;
    private readonly config: unknown;
    private columns: AnswerColumn[] | null = null;

    constructor(assessment: AssessmentDescriptor, config: unknown) {
        if (!this.canSummarize(assessment)) {
            throw new PreconditionFailedError('Assessment ' + assessment.identifier + ' uses framework '
                + assessment.frameworkIdentifier + ', expected ' + ASSESSMENT_FRAMEWORK_IDENTIFIER);
        }
        this.assessment = assessment;
        this.config = config;
    }

    canSummarize(assessment: AssessmentDescriptor) {
        return assessment.frameworkIdentifier === ASSESSMENT_FRAMEWORK_IDENTIFIER;
    }

    summarizeResults(ctx: Context, resultJson: string): Map<string, string> {
        let result = decodeOrThrow(ResultNodeCodec, parseJsonOrThrow(resultJson, 'assessment result'), 'assessment result');
        let answers = flattenAnswers(result);

        let columnNames = new Set(this.getColumnNames());
        for (let column of answers.keys()) {
            if (!columnNames.has(column)) {
                log.debug(ctx, 'Unexpected column: ' + column + ' when summarizing results for assessment: ' + this.assessment.identifier);
            }
        }
        return answers;
    }

    getColumnNames(): string[] {
        return this.getSurveyColumns().map((c) => c.columnName);
    }

    /**
     * Columns with their answer types. Empty when the assessment has no configuration.
     */
    getSurveyColumns(): AnswerColumn[] {
        if (this.columns) {
            return this.columns;
        }
        if (this.config === null || this.config === undefined) {
            this.columns = [];
        } else {
            this.columns = flattenAnswerColumns(decodeOrThrow(ConfigNodeCodec, this.config, 'assessment config of ' + this.assessment.identifier));
        }
        return this.columns;
    }
}
