import * as t from 'io-ts';

/**
 * Node of a result tree. Answers carry `value`, sections and nested assessments carry `stepHistory`.
 */
export interface ResultNode {
    type: string;
    identifier: string;
    value?: unknown;
    stepHistory?: ResultNode[] | null;
}

export const ResultNodeCodec: t.Type<ResultNode> = t.recursion('ResultNode', () => t.intersection([
    t.type({
        type: t.string,
        identifier: t.string
    }),
    t.partial({
        value: t.unknown,
        stepHistory: t.union([t.array(ResultNodeCodec), t.null])
    })
]));
