import { ResultNode } from '../model/AssessmentResult';

// Column names of nested answers join the section path and the answer identifier
export const SECTION_SEPARATOR = '_';

export function stringifyAnswer(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    return JSON.stringify(value);
}

function collect(nodes: ResultNode[], prefix: string, res: Map<string, string>) {
    for (let node of nodes) {
        if (node.type === 'answer') {
            if (node.value !== null && node.value !== undefined) {
                res.set(prefix + node.identifier, stringifyAnswer(node.value));
            }
        } else if (node.stepHistory) {
            collect(node.stepHistory, prefix + node.identifier + SECTION_SEPARATOR, res);
        }
    }
}

/**
 * Flattens the answers of a result tree into column name -> value. Later answers with the same
 * column name replace earlier ones.
 */
export function flattenAnswers(result: ResultNode): Map<string, string> {
    let res = new Map<string, string>();
    collect(result.stepHistory || [], '', res);
    return res;
}
