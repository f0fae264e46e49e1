export class WarehouseError extends Error {
    readonly status: number;

    constructor(message: string, status: number) {
        super(message);
        this.name = 'WarehouseError';
        this.status = status;
    }

    get retryable() {
        return this.status === 429 || this.status >= 500;
    }
}
