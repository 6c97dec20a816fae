export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = JsonValue[];

export interface JsonObject {
    [key: string]: JsonValue;
}

/**
 * Root of a Swagger 2.0 document. Only the keys the pipeline touches are
 * listed; everything else passes through untouched.
 */
export type SwaggerDocument = JsonObject;

export const HTTP_METHODS = ['get', 'post', 'put', 'delete', 'patch', 'options', 'head'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

const HTTP_METHOD_SET: ReadonlySet<string> = new Set(HTTP_METHODS);

export function isHttpMethod(key: string): boolean {
    return HTTP_METHOD_SET.has(key.toLowerCase());
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getObject(parent: JsonObject, key: string): JsonObject | undefined {
    const value = parent[key];
    return isJsonObject(value) ? value : undefined;
}

export function getArray(parent: JsonObject, key: string): JsonArray | undefined {
    const value = parent[key];
    return Array.isArray(value) ? value : undefined;
}

export function getString(parent: JsonObject, key: string): string | undefined {
    const value = parent[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Returns the object stored under `key`, creating an empty one when the key
 * is missing or holds something else.
 */
export function ensureObject(parent: JsonObject, key: string): JsonObject {
    const existing = getObject(parent, key);
    if (existing) {
        return existing;
    }
    const created: JsonObject = {};
    parent[key] = created;
    return created;
}

export function cloneDocument<T extends JsonValue>(value: T): T {
    return structuredClone(value);
}

/**
 * Checks an arbitrary parsed value into the JSON tree model. YAML loaders can
 * hand back values JSON has no room for, so those are rejected here rather
 * than leaking into the transformers.
 */
export function toJsonValue(value: unknown, path: string = '$'): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new Error(`Unsupported non-finite number at ${path}`);
        }
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item, index) => toJsonValue(item, `${path}[${index}]`));
    }
    if (isPlainObject(value)) {
        const result: JsonObject = {};
        for (const [key, item] of Object.entries(value)) {
            result[key] = toJsonValue(item, `${path}.${key}`);
        }
        return result;
    }
    throw new Error(`Unsupported value of type ${describeType(value)} at ${path}`);
}

export function toJsonObject(value: unknown, what: string): JsonObject {
    const json = toJsonValue(value);
    if (!isJsonObject(json)) {
        throw new Error(`${what} must be an object`);
    }
    return json;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

function describeType(value: unknown): string {
    if (value instanceof Date) {
        return 'Date';
    }
    return typeof value;
}
