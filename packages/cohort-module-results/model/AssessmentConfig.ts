import * as t from 'io-ts';

/**
 * Node of an assessment configuration. Sections and assessments nest `steps`,
 * questions describe the answer they produce.
 */
export interface ConfigNode {
    type: string;
    identifier: string;
    steps?: ConfigNode[] | null;
    inputItem?: { type: string } | null;
    baseType?: string | null;
    singleAnswer?: boolean | null;
}

export const ConfigNodeCodec: t.Type<ConfigNode> = t.recursion('ConfigNode', () => t.intersection([
    t.type({
        type: t.string,
        identifier: t.string
    }),
    t.partial({
        steps: t.union([t.array(ConfigNodeCodec), t.null]),
        inputItem: t.union([t.type({ type: t.string }), t.null]),
        baseType: t.union([t.string, t.null]),
        singleAnswer: t.union([t.boolean, t.null])
    })
]));

export type AnswerType = 'STRING' | 'INTEGER' | 'NUMBER' | 'BOOLEAN' | 'ARRAY';

export interface AnswerColumn {
    columnName: string;
    answerType: AnswerType;
}
