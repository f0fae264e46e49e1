import { flattenAnswers, stringifyAnswer } from './flattenAnswers';

describe('flattenAnswers', () => {
    it('should key answers by identifier', () => {
        let res = flattenAnswers({
            type: 'assessment',
            identifier: 'survey',
            stepHistory: [
                { type: 'answer', identifier: 'q1', value: 'yes' },
                { type: 'answer', identifier: 'q2', value: 3 }
            ]
        });
        expect([...res.entries()]).toEqual([['q1', 'yes'], ['q2', '3']]);
    });

    it('should prefix answers nested in sections', () => {
        let res = flattenAnswers({
            type: 'assessment',
            identifier: 'survey',
            stepHistory: [{
                type: 'section',
                identifier: 'outer',
                stepHistory: [{
                    type: 'section',
                    identifier: 'inner',
                    stepHistory: [{ type: 'answer', identifier: 'q1', value: false }]
                }]
            }]
        });
        expect([...res.entries()]).toEqual([['outer_inner_q1', 'false']]);
    });

    it('should let later answers win and skip null answers', () => {
        let res = flattenAnswers({
            type: 'assessment',
            identifier: 'survey',
            stepHistory: [
                { type: 'answer', identifier: 'q1', value: 'first' },
                { type: 'answer', identifier: 'q2', value: null },
                { type: 'answer', identifier: 'q3' },
                { type: 'answer', identifier: 'q1', value: 'second' }
            ]
        });
        expect([...res.entries()]).toEqual([['q1', 'second']]);
    });

    it('should ignore results that are neither answers nor containers', () => {
        let res = flattenAnswers({
            type: 'assessment',
            identifier: 'survey',
            stepHistory: [{ type: 'base', identifier: 'intro' }, { type: 'section', identifier: 'empty', stepHistory: null }]
        });
        expect(res.size).toBe(0);
    });

    it('should return nothing for empty result', () => {
        expect(flattenAnswers({ type: 'assessment', identifier: 'survey' }).size).toBe(0);
    });
});

describe('stringifyAnswer', () => {
    it('should stringify values', () => {
        expect(stringifyAnswer('text')).toBe('text');
        expect(stringifyAnswer(1.25)).toBe('1.25');
        expect(stringifyAnswer(true)).toBe('true');
        expect(stringifyAnswer([1, 2])).toBe('[1,2]');
        expect(stringifyAnswer({ a: 'b' })).toBe('{"a":"b"}');
    });
});
