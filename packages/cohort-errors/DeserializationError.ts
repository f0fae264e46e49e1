export class DeserializationError extends Error {
    readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super(details.length > 0 ? message + ': ' + details.join('; ') : message);
        this.name = 'DeserializationError';
        this.details = details;
    }
}
