import { WebhookSettings } from '../../services/settingsTypes';
import { cloneDocument, getArray, getObject, SwaggerDocument } from '../swaggerTypes';

/**
 * Marks `webhook.url` required on the webhook request model and drops
 * `minProperties`, which the certification tooling rejects.
 */
export function makeWebhookUrlRequired(
    document: SwaggerDocument,
    settings: Pick<WebhookSettings, 'requestModel'>
): SwaggerDocument {
    const result = cloneDocument(document);
    const definitions = getObject(result, 'definitions');
    const requestModel = definitions ? getObject(definitions, settings.requestModel) : undefined;
    const properties = requestModel ? getObject(requestModel, 'properties') : undefined;
    const webhook = properties ? getObject(properties, 'webhook') : undefined;
    if (!webhook) {
        return result;
    }

    const webhookProperties = getObject(webhook, 'properties');
    if (webhookProperties && 'url' in webhookProperties) {
        const required = getArray(webhook, 'required') ?? [];
        if (!required.includes('url')) {
            required.push('url');
        }
        webhook.required = required;
    }

    delete webhook.minProperties;
    return result;
}
