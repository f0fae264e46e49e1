import { Context } from '../../cohort-utils/Context';

export type DocumentKey = { [attribute: string]: string | number };
export type DocumentItem = { [attribute: string]: unknown };

export interface QueryRequest {
    index?: string;
    hashKey: { name: string, value: string | number };
    descending?: boolean;
    limit?: number;
}

export interface UpdateRequest {
    set?: DocumentItem;
    remove?: string[];
}

export interface PutOptions {
    // Fail with DuplicateItemError when an item with the same primary key exists
    ifNotExists?: string;
}

/**
 * Key-value access to a document store addressed by table name and primary key.
 * String sets are represented as Set<string>.
 */
export interface DocumentStore {
    getItem(ctx: Context, table: string, key: DocumentKey): Promise<DocumentItem | null>;
    putItem(ctx: Context, table: string, item: DocumentItem, opts?: PutOptions): Promise<void>;
    deleteItem(ctx: Context, table: string, key: DocumentKey): Promise<void>;
    updateItem(ctx: Context, table: string, key: DocumentKey, update: UpdateRequest): Promise<void>;
    query(ctx: Context, table: string, query: QueryRequest): Promise<DocumentItem[]>;
}
