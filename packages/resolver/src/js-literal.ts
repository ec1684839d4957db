/**
 * Decoding of JSON payloads embedded in JavaScript string literals, as in
 * `var x = JSON.parse("{\"a\":1}");`.
 */

import type { JsonValue } from '@trialpack/types';

/**
 * Turns the body of a double-quoted JavaScript string literal into the
 * string it denotes.
 *
 * `\'` is not a JSON escape, so it is rewritten before the body is read
 * as a JSON string. Escape pairs are consumed left to right, which keeps
 * `\\'` (an escaped backslash followed by a quote) intact.
 *
 * @param body - Characters between the quotes
 * @returns The decoded string
 * @throws SyntaxError when the body is not a valid literal
 */
export function decodeStringLiteral(body: string): string {
    const jsonBody = body.replace(/\\(.)/gs, (pair: string, char: string) =>
        char === "'" ? "'" : pair,
    );
    const decoded: unknown = JSON.parse(`"${jsonBody}"`);
    if (typeof decoded !== 'string') {
        throw new SyntaxError('String literal did not decode to a string');
    }
    return decoded;
}

/**
 * Decodes a string literal body and parses the JSON it contains.
 */
export function parseEmbeddedJson(body: string): JsonValue {
    return parseJson(decodeStringLiteral(body));
}

/**
 * `JSON.parse` with its result typed as {@link JsonValue}.
 */
export function parseJson(text: string): JsonValue {
    const value: JsonValue = JSON.parse(text);
    return value;
}

/**
 * Narrows a JSON value to an object.
 */
export function isJsonObject(
    value: JsonValue | undefined,
): value is { [key: string]: JsonValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
