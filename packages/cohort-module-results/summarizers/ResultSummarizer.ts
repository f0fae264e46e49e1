import { Context } from '../../cohort-utils/Context';

export interface AssessmentDescriptor {
    identifier: string;
    frameworkIdentifier?: string | null;
}

/**
 * Turns the uploaded result file of an assessment into column name -> value pairs.
 */
export interface ResultSummarizer {
    readonly frameworkIdentifier: string;

    // Name of the file in the upload that holds the result
    readonly resultFilename: string;

    canSummarize(assessment: AssessmentDescriptor): boolean;
    summarizeResults(ctx: Context, resultJson: string): Map<string, string>;

    // All columns the assessment can produce, in order, even before any result exists
    getColumnNames(): string[];
}

/**
 * Builds a summarizer for an assessment and its configuration (the parsed configuration JSON, or null).
 */
export type SummarizerFactory = (assessment: AssessmentDescriptor, config: unknown) => ResultSummarizer;
