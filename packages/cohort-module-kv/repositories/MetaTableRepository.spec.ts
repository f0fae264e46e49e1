import { createNamedContext } from '../../cohort-utils/Context';
import { createTestDocumentStore, testTables } from '../store/testTables';
import { MetaTableRepository } from './MetaTableRepository';

describe('MetaTableRepository', () => {
    const ctx = createNamedContext('test');

    it('should return null when default table is not created', async () => {
        let repo = new MetaTableRepository(createTestDocumentStore(), testTables);
        expect(await repo.getDefaultTableForStudy(ctx, 'study-1')).toBeNull();
    });

    it('should read and delete default table', async () => {
        let store = createTestDocumentStore();
        await store.putItem(ctx, testTables.metaTable, { tableName: 'study-1-default', tableId: 'syn-100' });
        let repo = new MetaTableRepository(store, testTables);

        expect(await repo.getDefaultTableForStudy(ctx, 'study-1')).toBe('syn-100');
        expect(await repo.getDefaultTableForStudy(ctx, 'study-2')).toBeNull();

        await repo.deleteDefaultTableForStudy(ctx, 'study-1');
        expect(await repo.getDefaultTableForStudy(ctx, 'study-1')).toBeNull();
    });
});
