import { cloneDocument, getArray, getString, isJsonObject, SwaggerDocument } from '../swaggerTypes';
import { forEachOperation } from './operations';

const VERSION_SEGMENT = /^(v\d+|api|version\d+)$/i;

/**
 * Resource name of a path, skipping a leading version segment and any
 * file extension: `/v2/records/{id}.json` gives `records`.
 */
export function getEndpointName(path: string): string {
    const parts = path.replace(/^\//, '').split('/').filter(part => part.length > 0);

    if (parts.length === 0) {
        return 'Root';
    }

    if (VERSION_SEGMENT.test(parts[0])) {
        return parts.length > 1 ? parts[1].split('.')[0] : 'API';
    }
    return parts[0].split('.')[0];
}

function capitalizeFirst(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * `record_id` and `sort-order` become `Record Id` and `Sort Order`
 */
export function toReadableName(name: string): string {
    return name
        .replace(/_/g, ' ')
        .replace(/-/g, ' ')
        .split(/\s+/)
        .filter(word => word.length > 0)
        .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

/**
 * Fills in the operation and parameter metadata the connector designer
 * expects: operation descriptions, capitalized operationIds, parameter
 * summaries and descriptions, and URL encoding for path parameters.
 */
export function enhanceEndpoints(document: SwaggerDocument): SwaggerDocument {
    const result = cloneDocument(document);

    forEachOperation(result, (operation, { path, method }) => {
        const endpointName = getEndpointName(path);
        const capitalizedName = endpointName ? capitalizeFirst(endpointName) : 'Root';

        if (!getString(operation, 'description')) {
            operation.description = `${capitalizedName} ${method.toUpperCase()}`;
        }

        const operationId = getString(operation, 'operationId');
        if (operationId) {
            operation.operationId = capitalizeFirst(operationId);
        }

        for (const parameter of getArray(operation, 'parameters') ?? []) {
            // A referenced parameter has no name of its own; its shared definition carries the metadata
            if (!isJsonObject(parameter) || '$ref' in parameter) {
                continue;
            }

            if (!('x-ms-summary' in parameter)) {
                parameter['x-ms-summary'] = toReadableName(getString(parameter, 'name') ?? 'Parameter');
            }

            if (!('description' in parameter)) {
                parameter.description = parameter['x-ms-summary'];
            }

            if (parameter.in === 'path' && !('x-ms-url-encoding' in parameter)) {
                parameter['x-ms-url-encoding'] = 'single';
            }
        }
    });

    return result;
}
