export class DuplicateItemError extends Error {
    constructor(table: string) {
        super('Item already exists in ' + table);
        this.name = 'DuplicateItemError';
    }
}
