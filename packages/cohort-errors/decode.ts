import * as t from 'io-ts';
import { isRight } from 'fp-ts/lib/Either';
import { PathReporter } from 'io-ts/lib/PathReporter';
import { DeserializationError } from './DeserializationError';

/**
 * Validates `value` against `codec`, throwing DeserializationError with the io-ts path report on mismatch.
 */
export function decodeOrThrow<A, O>(codec: t.Type<A, O, unknown>, value: unknown, what: string): A {
    let decoded = codec.decode(value);
    if (isRight(decoded)) {
        return decoded.right;
    }
    throw new DeserializationError('Invalid ' + what, PathReporter.report(decoded));
}

export function parseJsonOrThrow(json: string, what: string): unknown {
    try {
        return JSON.parse(json);
    } catch (e) {
        throw new DeserializationError('Malformed ' + what + ' JSON', [e instanceof Error ? e.message : String(e)]);
    }
}
