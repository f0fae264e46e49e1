import { AnswerColumn, AnswerType, ConfigNode } from '../model/AssessmentConfig';
import { SECTION_SEPARATOR } from './flattenAnswers';

const inputTypes: { [inputType: string]: AnswerType } = {
    string: 'STRING',
    date: 'STRING',
    time: 'STRING',
    integer: 'INTEGER',
    year: 'INTEGER',
    decimal: 'NUMBER',
    duration: 'NUMBER',
    checkbox: 'BOOLEAN'
};

const baseTypes: { [baseType: string]: AnswerType } = {
    string: 'STRING',
    integer: 'INTEGER',
    number: 'NUMBER',
    boolean: 'BOOLEAN'
};

function answerType(node: ConfigNode): AnswerType | null {
    switch (node.type) {
        case 'simpleQuestion':
            return (node.inputItem && inputTypes[node.inputItem.type]) || 'STRING';
        case 'choiceQuestion':
            if (node.singleAnswer === false) {
                return 'ARRAY';
            }
            return (node.baseType && baseTypes[node.baseType]) || 'STRING';
        default:
            // Instructions, overviews, completion steps
            return null;
    }
}

function collect(nodes: ConfigNode[], prefix: string, res: AnswerColumn[]) {
    for (let node of nodes) {
        if (node.steps) {
            collect(node.steps, prefix + node.identifier + SECTION_SEPARATOR, res);
            continue;
        }
        let type = answerType(node);
        if (type) {
            res.push({ columnName: prefix + node.identifier, answerType: type });
        }
    }
}

/**
 * Columns produced by an assessment, in step order, named the same way flattenAnswers names values.
 */
export function flattenAnswerColumns(assessment: ConfigNode): AnswerColumn[] {
    let res: AnswerColumn[] = [];
    collect(assessment.steps || [], '', res);
    return res;
}
