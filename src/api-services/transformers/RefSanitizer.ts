import { JsonObject, JsonValue } from '../swaggerTypes';

/**
 * A `$ref` object may not carry siblings, so only the reference and its
 * `x-` extensions survive. Everything else is rewritten recursively.
 */
export function removeSiblingsOfRefs<T extends JsonValue>(value: T): T;
export function removeSiblingsOfRefs(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(item => removeSiblingsOfRefs(item));
    }
    if (typeof value !== 'object' || value === null) {
        return value;
    }

    if ('$ref' in value) {
        const result: JsonObject = { $ref: value.$ref };
        for (const [key, item] of Object.entries(value)) {
            if (key.startsWith('x-')) {
                result[key] = structuredClone(item);
            }
        }
        return result;
    }

    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
        result[key] = removeSiblingsOfRefs(item);
    }
    return result;
}
