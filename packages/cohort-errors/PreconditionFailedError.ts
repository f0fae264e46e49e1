export class PreconditionFailedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionFailedError';
    }
}
