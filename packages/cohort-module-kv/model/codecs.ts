import * as t from 'io-ts';

const isString = (v: unknown): v is string => typeof v === 'string';

/**
 * String set attribute. The document client returns Set<string>; plain arrays are accepted too.
 */
export const StringSet = new t.Type<Set<string>, string[], unknown>(
    'StringSet',
    (u): u is Set<string> => u instanceof Set && [...u].every(isString),
    (u, c) => {
        if (u instanceof Set) {
            let values = [...u];
            return values.every(isString) ? t.success(new Set(values)) : t.failure(u, c);
        }
        if (Array.isArray(u) && u.every(isString)) {
            return t.success(new Set(u));
        }
        return t.failure(u, c);
    },
    (a) => [...a]
);

export const nullable = <C extends t.Mixed>(codec: C) => t.union([codec, t.null]);
