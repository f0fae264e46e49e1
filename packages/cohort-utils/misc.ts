export function isDefined<T>(x: T | undefined | null): x is T {
    return x !== undefined && x !== null;
}

export function isBlank(x: string | undefined | null): boolean {
    return !isDefined(x) || x.trim().length === 0;
}
