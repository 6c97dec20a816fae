import { cloneDocument, getObject, JsonObject, JsonValue, SwaggerDocument } from '../swaggerTypes';

const DEFINITIONS_PREFIX = '#/definitions/';

export interface PruneResult {
    document: SwaggerDocument;
    removedModels: string[];
}

/**
 * Names of every model referenced through `#/definitions/...`, searched
 * across the whole document including the definitions themselves.
 */
export function findUsedModels(document: SwaggerDocument): Set<string> {
    const usedModels = new Set<string>();

    const extractRefs = (value: JsonValue): void => {
        if (Array.isArray(value)) {
            value.forEach(extractRefs);
            return;
        }
        if (typeof value !== 'object' || value === null) {
            return;
        }
        const ref = value.$ref;
        if (typeof ref === 'string' && ref.startsWith(DEFINITIONS_PREFIX)) {
            usedModels.add(ref.slice(DEFINITIONS_PREFIX.length));
        }
        Object.values(value).forEach(extractRefs);
    };

    extractRefs(document);
    return usedModels;
}

/**
 * Removes definitions nothing refers to. This is a single scan: a model
 * kept alive only by a model removed here goes on the next call.
 */
export function removeUnusedModels(document: SwaggerDocument): PruneResult {
    const result = cloneDocument(document);
    const definitions = getObject(result, 'definitions');
    if (!definitions) {
        return { document: result, removedModels: [] };
    }

    const usedModels = findUsedModels(document);
    const filteredDefinitions: JsonObject = {};
    const removedModels: string[] = [];

    for (const [modelName, model] of Object.entries(definitions)) {
        if (usedModels.has(modelName)) {
            filteredDefinitions[modelName] = model;
        } else {
            removedModels.push(modelName);
        }
    }

    result.definitions = filteredDefinitions;
    return { document: result, removedModels: removedModels.sort() };
}
