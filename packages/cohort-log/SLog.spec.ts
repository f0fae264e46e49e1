import { createNamedContext } from '../cohort-utils/Context';
import { formatMessage } from './src/SLogImpl';
import { withLogContext, withLogData, withLogDisabled } from './withLogContext';
import { SLogContext, SLogContext2 } from './src/SLogContext';

describe('SLog', () => {
    it('should format message with context name and path', () => {
        let ctx = withLogContext(createNamedContext('export'), ['study-1']);
        expect(formatMessage(ctx, 'warehouse', 'Appended', [3, 'rows'])).toBe('export | study-1 warehouse: Appended 3 rows');
    });

    it('should format errors with their message', () => {
        let ctx = createNamedContext('export');
        let error = new Error('boom');
        error.stack = undefined;
        expect(formatMessage(ctx, 'kv', error, [])).toBe('export | kv: boom');
    });

    it('should merge log data and keep path when disabled', () => {
        let ctx = withLogData(createNamedContext('test'), { studyId: 'study-1' });
        ctx = withLogData(ctx, { tableId: 'table-1' });
        ctx = withLogDisabled(withLogContext(ctx, ['a']));
        expect(SLogContext2.get(ctx)).toEqual({ studyId: 'study-1', tableId: 'table-1' });
        expect(SLogContext.get(ctx)).toEqual({ path: ['a'], disabled: true });
    });
});
