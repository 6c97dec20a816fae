import { JsonObject, JsonValue } from '../swaggerTypes';

const UNSUPPORTED_KEYWORDS: ReadonlySet<string> = new Set(['anyOf', 'oneOf']);

/**
 * Strips `anyOf` and `oneOf` at every depth. `allOf` stays.
 */
export function removeAnyOfOneOf<T extends JsonValue>(value: T): T;
export function removeAnyOfOneOf(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(item => removeAnyOfOneOf(item));
    }
    if (typeof value !== 'object' || value === null) {
        return value;
    }

    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
        if (!UNSUPPORTED_KEYWORDS.has(key)) {
            result[key] = removeAnyOfOneOf(item);
        }
    }
    return result;
}
