/**
 * JSON helpers for rewriting cloned case data.
 */

import type { JsonObject, JsonValue } from '@trialpack/types';

/**
 * Deep copy of a JSON value. Frozen input gives a mutable copy.
 */
export function cloneJson(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(cloneJson);
    }
    if (typeof value === 'object' && value !== null) {
        return cloneObject(value);
    }
    return value;
}

export function cloneObject(object: Readonly<JsonObject>): JsonObject {
    const copy: JsonObject = {};
    for (const [key, value] of Object.entries(object)) {
        copy[key] = cloneJson(value);
    }
    return copy;
}

function unescapeSegment(segment: string): string {
    return segment.replaceAll('~1', '/').replaceAll('~0', '~');
}

/**
 * Sets the value a JSON pointer (RFC 6901) names. Only existing
 * containers are traversed.
 *
 * @returns false when the pointer does not lead into `root`
 */
export function setPointer(root: JsonObject, pointer: string, value: JsonValue): boolean {
    if (!pointer.startsWith('/')) {
        return false;
    }
    const segments = pointer.slice(1).split('/').map(unescapeSegment);
    const last = segments.pop();
    if (last === undefined) {
        return false;
    }

    let container: JsonValue = root;
    for (const segment of segments) {
        let next: JsonValue | undefined;
        if (Array.isArray(container)) {
            next = container[Number(segment)];
        } else if (typeof container === 'object' && container !== null) {
            next = container[segment];
        }
        if (typeof next !== 'object' || next === null) {
            return false;
        }
        container = next;
    }

    if (Array.isArray(container)) {
        const index = Number(last);
        if (!Number.isInteger(index) || index < 0 || index >= container.length) {
            return false;
        }
        container[index] = value;
        return true;
    }
    if (typeof container === 'object' && container !== null) {
        container[last] = value;
        return true;
    }
    return false;
}

/**
 * Applies `transform` to every string of a JSON value, in place.
 */
export function mapStrings(value: JsonValue, transform: (text: string) => string): JsonValue {
    if (typeof value === 'string') {
        return transform(value);
    }
    if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
            value[i] = mapStrings(value[i], transform);
        }
        return value;
    }
    if (typeof value === 'object' && value !== null) {
        for (const key of Object.keys(value)) {
            value[key] = mapStrings(value[key], transform);
        }
    }
    return value;
}

/**
 * JSON text that is safe inside a `<script>` element.
 */
export function scriptJson(value: JsonValue): string {
    return JSON.stringify(value).replaceAll('</', '<\\/');
}
