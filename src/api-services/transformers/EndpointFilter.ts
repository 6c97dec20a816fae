import { cloneDocument, getObject, isHttpMethod, isJsonObject, JsonObject, SwaggerDocument } from '../swaggerTypes';

export function toEndpointKey(path: string, method: string): string {
    return `${path}/${method}`;
}

/**
 * Lower-cases the method part of a `<path>/<method>` entry
 */
export function normalizeEndpointKey(endpoint: string): string {
    const separator = endpoint.lastIndexOf('/');
    return toEndpointKey(endpoint.slice(0, separator), endpoint.slice(separator + 1).toLowerCase());
}

/**
 * Keeps only the operations named in the allow-list. Entries use the
 * `<path>/<method>` form, e.g. `/v2/records.json/get`. Path-level keys such
 * as `parameters` are never filtered, but a path left with nothing at all
 * is dropped. An empty allow-list keeps everything.
 */
export function filterEndpoints(document: SwaggerDocument, endpointsToKeep: readonly string[]): SwaggerDocument {
    const result = cloneDocument(document);
    if (endpointsToKeep.length === 0) {
        return result;
    }

    const paths = getObject(result, 'paths');
    if (!paths) {
        return result;
    }

    const allowed = new Set(endpointsToKeep.map(normalizeEndpointKey));
    const filteredPaths: JsonObject = {};

    for (const [path, pathItem] of Object.entries(paths)) {
        if (!isJsonObject(pathItem)) {
            continue;
        }
        const filteredMethods: JsonObject = {};

        for (const [key, value] of Object.entries(pathItem)) {
            if (!isHttpMethod(key)) {
                filteredMethods[key] = value;
            } else if (allowed.has(toEndpointKey(path, key.toLowerCase()))) {
                filteredMethods[key] = value;
            }
        }

        if (Object.keys(filteredMethods).length > 0) {
            filteredPaths[path] = filteredMethods;
        }
    }

    result.paths = filteredPaths;
    return result;
}

/**
 * All `<path>/<method>` keys of the document, sorted
 */
export function listEndpoints(document: SwaggerDocument): string[] {
    const paths = getObject(document, 'paths');
    if (!paths) {
        return [];
    }
    const endpoints: string[] = [];
    for (const [path, pathItem] of Object.entries(paths)) {
        if (!isJsonObject(pathItem)) {
            continue;
        }
        for (const key of Object.keys(pathItem)) {
            if (isHttpMethod(key)) {
                endpoints.push(toEndpointKey(path, key.toLowerCase()));
            }
        }
    }
    return endpoints.sort();
}

export function countEndpoints(document: SwaggerDocument): number {
    return listEndpoints(document).length;
}
