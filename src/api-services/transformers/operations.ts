import { getObject, isHttpMethod, isJsonObject, JsonObject, SwaggerDocument } from '../swaggerTypes';

export interface OperationContext {
    path: string;
    method: string;
    pathItem: JsonObject;
}

/**
 * Calls `visit` for every HTTP-method operation, in document order
 */
export function forEachOperation(
    document: SwaggerDocument,
    visit: (operation: JsonObject, context: OperationContext) => void
): void {
    const paths = getObject(document, 'paths');
    if (!paths) {
        return;
    }
    for (const [path, pathItem] of Object.entries(paths)) {
        if (!isJsonObject(pathItem)) {
            continue;
        }
        for (const [method, operation] of Object.entries(pathItem)) {
            if (isHttpMethod(method) && isJsonObject(operation)) {
                visit(operation, { path, method, pathItem });
            }
        }
    }
}
