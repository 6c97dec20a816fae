import { cloneDocument, getObject, JsonObject, SwaggerDocument } from '../swaggerTypes';
import { forEachOperation } from './operations';

/**
 * Drops every non-2xx response, `default` included. Runs before model
 * pruning so that models used only by error responses fall out with them.
 */
export function keepOnlySuccessResponses(document: SwaggerDocument): SwaggerDocument {
    const result = cloneDocument(document);

    forEachOperation(result, (operation) => {
        const responses = getObject(operation, 'responses');
        if (!responses) {
            return;
        }
        const successResponses: JsonObject = {};
        for (const [statusCode, response] of Object.entries(responses)) {
            if (statusCode.startsWith('2')) {
                successResponses[statusCode] = response;
            }
        }
        operation.responses = successResponses;
    });

    return result;
}
