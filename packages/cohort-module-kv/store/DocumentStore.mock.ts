import { Context } from '../../cohort-utils/Context';
import { DuplicateItemError } from '../../cohort-errors/DuplicateItemError';
import { DocumentItem, DocumentKey, DocumentStore, PutOptions, QueryRequest, UpdateRequest } from './DocumentStore';

type KeySchema = { hashKey: string, rangeKey?: string };
export type TableDefinition = KeySchema & {
    indexes?: { [name: string]: KeySchema & { projection?: string[] } }
};

function cloneValue(value: unknown): unknown {
    if (value instanceof Set) {
        return new Set(value);
    }
    if (Array.isArray(value)) {
        return value.map(cloneValue);
    }
    if (value !== null && typeof value === 'object') {
        let res: { [key: string]: unknown } = {};
        for (let [k, v] of Object.entries(value)) {
            res[k] = cloneValue(v);
        }
        return res;
    }
    return value;
}

function clone(item: DocumentItem): DocumentItem {
    let res: DocumentItem = {};
    for (let [k, v] of Object.entries(item)) {
        res[k] = cloneValue(v);
    }
    return res;
}

function compareKeys(a: unknown, b: unknown) {
    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

/**
 * In-process document store for tests. Tables must be defined before use.
 */
export class InMemoryDocumentStore implements DocumentStore {
    private readonly tables = new Map<string, { definition: TableDefinition, items: Map<string, DocumentItem> }>();
    readonly calls: { op: string, table: string }[] = [];

    defineTable(name: string, definition: TableDefinition) {
        this.tables.set(name, { definition, items: new Map() });
        return this;
    }

    /** All items of a table, in insertion order, for assertions */
    items(table: string): DocumentItem[] {
        return [...this.table(table).items.values()].map(clone);
    }

    async getItem(ctx: Context, table: string, key: DocumentKey): Promise<DocumentItem | null> {
        this.calls.push({ op: 'get', table });
        let t = this.table(table);
        let item = t.items.get(this.primaryKey(t.definition, key));
        return item ? clone(item) : null;
    }

    async putItem(ctx: Context, table: string, item: DocumentItem, opts?: PutOptions) {
        this.calls.push({ op: 'put', table });
        let t = this.table(table);
        let pk = this.primaryKey(t.definition, item);
        if (opts && opts.ifNotExists && t.items.has(pk)) {
            throw new DuplicateItemError(table);
        }
        t.items.set(pk, clone(item));
    }

    async deleteItem(ctx: Context, table: string, key: DocumentKey) {
        this.calls.push({ op: 'delete', table });
        let t = this.table(table);
        t.items.delete(this.primaryKey(t.definition, key));
    }

    async updateItem(ctx: Context, table: string, key: DocumentKey, update: UpdateRequest) {
        this.calls.push({ op: 'update', table });
        let t = this.table(table);
        let pk = this.primaryKey(t.definition, key);
        let item: DocumentItem = t.items.get(pk) || { ...key };
        for (let [name, value] of Object.entries(update.set || {})) {
            item[name] = cloneValue(value);
        }
        for (let name of update.remove || []) {
            delete item[name];
        }
        t.items.set(pk, item);
    }

    async query(ctx: Context, table: string, query: QueryRequest): Promise<DocumentItem[]> {
        this.calls.push({ op: 'query', table });
        let t = this.table(table);
        let schema: KeySchema & { projection?: string[] } = t.definition;
        if (query.index) {
            let index = t.definition.indexes && t.definition.indexes[query.index];
            if (!index) {
                throw Error('Unknown index ' + query.index + ' on ' + table);
            }
            schema = index;
        }
        let rangeKey = schema.rangeKey;
        let matched = [...t.items.values()].filter((v) => v[query.hashKey.name] === query.hashKey.value && v[schema.hashKey] !== undefined);
        if (rangeKey) {
            matched.sort((a, b) => compareKeys(a[rangeKey], b[rangeKey]));
        }
        if (query.descending) {
            matched.reverse();
        }
        if (query.limit !== undefined) {
            matched = matched.slice(0, query.limit);
        }
        let projection = schema.projection;
        if (projection) {
            let attributes = [t.definition.hashKey, t.definition.rangeKey, schema.hashKey, schema.rangeKey, ...projection];
            return matched.map((v) => {
                let res: DocumentItem = {};
                for (let a of attributes) {
                    if (a !== undefined && v[a] !== undefined) {
                        res[a] = cloneValue(v[a]);
                    }
                }
                return res;
            });
        }
        return matched.map(clone);
    }

    private table(name: string) {
        let t = this.tables.get(name);
        if (!t) {
            throw Error('Table ' + name + ' is not defined');
        }
        return t;
    }

    private primaryKey(definition: TableDefinition, key: DocumentItem) {
        let hash = key[definition.hashKey];
        if (hash === undefined) {
            throw Error('Missing hash key ' + definition.hashKey);
        }
        if (!definition.rangeKey) {
            return JSON.stringify([hash]);
        }
        let range = key[definition.rangeKey];
        if (range === undefined) {
            throw Error('Missing range key ' + definition.rangeKey);
        }
        return JSON.stringify([hash, range]);
    }
}
