import { WebhookSettings } from '../services/settingsTypes';
import { FileParserService } from './FileParserService';
import {
    cloneDocument,
    ensureObject,
    getArray,
    getObject,
    getString,
    isJsonObject,
    JsonObject,
    SwaggerDocument
} from './swaggerTypes';
import { YamlFileUtils } from './YamlFileUtils';

export interface AugmentStepResult {
    success: boolean;
    messages: string[];
}

export interface AugmentResult extends AugmentStepResult {
    document: SwaggerDocument;
}

const CALLBACK_URL_DESCRIPTION = 'The callback URL that receives webhook events';
const DELETE_DESCRIPTION = 'Deletes a webhook subscription. This is called automatically by Power Automate ' +
    'when a flow using this trigger is deleted or modified.';

function definitionRef(model: string): JsonObject {
    return { $ref: `#/definitions/${model}` };
}

/**
 * Power Automate webhook trigger extensions: `x-ms-trigger`,
 * `x-ms-notification-url`, `x-ms-notification-content` and the payload
 * model they point at.
 */
export class TriggerAugmenterService {

    static createWebhookPayloadSchema(settings: Pick<WebhookSettings, 'eventTypes' | 'payloadDescription'>): JsonObject {
        const eventTypes = settings.eventTypes.length > 0 ? ` (e.g., ${settings.eventTypes.join(', ')})` : '';
        return {
            type: 'object',
            properties: {
                id: {
                    type: 'string',
                    'x-ms-summary': 'Event ID',
                    description: 'The unique identifier of the event'
                },
                type: {
                    type: 'string',
                    'x-ms-summary': 'Event Type',
                    description: `The type of event${eventTypes}`
                },
                owner_id: {
                    type: 'string',
                    'x-ms-summary': 'Owner ID',
                    description: 'The ID of the organization that owns this webhook'
                },
                data: {
                    type: 'object',
                    'x-ms-summary': 'Event Data',
                    description: 'The record or resource data associated with the event'
                },
                created_at: {
                    type: 'string',
                    format: 'date-time',
                    'x-ms-summary': 'Created At',
                    description: 'The timestamp when the event occurred'
                }
            },
            description: settings.payloadDescription
        };
    }

    /**
     * Turns the webhook registration POST into a trigger. Mutates `paths`.
     */
    static augmentWebhookEndpoint(paths: JsonObject, settings: WebhookSettings): AugmentStepResult {
        const messages: string[] = [];
        const webhookPath = settings.registrationPath;

        const pathItem = getObject(paths, webhookPath);
        if (!pathItem) {
            return { success: false, messages: [`Webhook endpoint ${webhookPath} not found in spec`] };
        }
        const operation = getObject(pathItem, 'post');
        if (!operation) {
            return { success: false, messages: [`POST method not found for ${webhookPath}`] };
        }

        operation['x-ms-trigger'] = 'single';
        operation['x-ms-trigger-hint'] = settings.triggerHint;
        operation.operationId = settings.triggerOperationId;
        operation.summary = settings.triggerSummary;
        operation.description = settings.triggerDescription;

        let callbackFound = false;
        for (const parameter of getArray(operation, 'parameters') ?? []) {
            if (!isJsonObject(parameter)) {
                continue;
            }
            const name = getString(parameter, 'name');

            if (name !== undefined && settings.callbackParameterNames.includes(name)) {
                parameter['x-ms-notification-url'] = true;
                parameter['x-ms-visibility'] = 'internal';
                parameter['x-ms-summary'] = 'Callback URL';
                if (!('description' in parameter)) {
                    parameter.description = CALLBACK_URL_DESCRIPTION;
                }
                callbackFound = true;
                break;
            }

            // The URL lives inside the body model; the model itself is marked in augmentDocument
            if (parameter.in === 'body' && name === 'body') {
                parameter.required = true;
                callbackFound = true;
                messages.push('Marked body parameter as required in webhook POST endpoint');
                break;
            }
        }

        if (!callbackFound) {
            return { success: false, messages: ['No callback URL parameter found in webhook POST endpoint'] };
        }

        pathItem['x-ms-notification-content'] = {
            description: settings.payloadDescription,
            schema: definitionRef(settings.payloadModel)
        };

        const responses = getObject(operation, 'responses');
        const successResponse = responses ? getObject(responses, '201') ?? getObject(responses, '200') : undefined;
        if (successResponse) {
            const schema = getObject(successResponse, 'schema');
            const properties = schema ? getObject(schema, 'properties') : undefined;
            if (properties) {
                properties._webhook_payload_example = definitionRef(settings.payloadModel);
            }

            ensureObject(successResponse, 'headers').Location = {
                type: 'string',
                description: 'URL to manage (update/delete) the created webhook',
                'x-ms-summary': 'Webhook Management URL'
            };
        }

        messages.push('Successfully augmented webhook endpoint with Power Automate extensions');
        return { success: true, messages };
    }

    /**
     * Hides the webhook DELETE from the action list; Power Automate calls it
     * when a flow is removed. Mutates `paths`.
     */
    static ensureWebhookDeleteEndpoint(paths: JsonObject, settings: WebhookSettings): AugmentStepResult {
        const deletePath = settings.deletePath;

        const pathItem = getObject(paths, deletePath);
        if (!pathItem) {
            return { success: false, messages: [`Webhook delete endpoint ${deletePath} not found in spec`] };
        }
        const operation = getObject(pathItem, 'delete');
        if (!operation) {
            return { success: false, messages: [`DELETE method not found for ${deletePath}`] };
        }

        operation['x-ms-visibility'] = 'internal';
        operation.operationId = settings.deleteOperationId;
        if (!('x-ms-summary' in operation)) {
            operation['x-ms-summary'] = 'Delete webhook';
        }
        if (!('description' in operation)) {
            operation.description = DELETE_DESCRIPTION;
        }

        return { success: true, messages: ['Webhook delete endpoint configured as internal action'] };
    }

    static augmentDocument(input: SwaggerDocument, settings: WebhookSettings): AugmentResult {
        const document = cloneDocument(input);
        const messages: string[] = [];

        const version = document.swagger;
        if (version !== '2.0') {
            messages.push(`Warning: Expected Swagger 2.0, found version ${version === undefined ? 'none' : String(version)}`);
        }

        const paths = getObject(document, 'paths');
        if (!paths) {
            return { success: false, messages: ['Error: No paths found in specification'], document };
        }

        const endpoint = this.augmentWebhookEndpoint(paths, settings);
        messages.push(...endpoint.messages);
        if (!endpoint.success) {
            return { success: false, messages, document };
        }

        const deletion = this.ensureWebhookDeleteEndpoint(paths, settings);
        messages.push(...deletion.messages);
        if (!deletion.success) {
            messages.push('Warning: Webhook delete endpoint not found or incomplete');
        }

        const definitions = ensureObject(document, 'definitions');
        definitions[settings.payloadModel] = this.createWebhookPayloadSchema(settings);
        messages.push(`Added ${settings.payloadModel} schema to definitions`);

        this.markRequestModel(definitions, settings, messages);

        return { success: true, messages, document };
    }

    private static markRequestModel(definitions: JsonObject, settings: WebhookSettings, messages: string[]): void {
        const requestModel = getObject(definitions, settings.requestModel);
        const properties = requestModel ? getObject(requestModel, 'properties') : undefined;
        const webhook = properties ? getObject(properties, 'webhook') : undefined;
        const webhookProperties = webhook ? getObject(webhook, 'properties') : undefined;
        if (!webhookProperties) {
            return;
        }

        const url = getObject(webhookProperties, 'url');
        if (url) {
            url['x-ms-notification-url'] = true;
            url['x-ms-visibility'] = 'internal';
            if (!('x-ms-summary' in url)) {
                url['x-ms-summary'] = 'Callback URL';
            }
            messages.push(`Augmented ${settings.requestModel}.webhook.url with x-ms-notification-url`);
        }

        const name = getObject(webhookProperties, 'name');
        if (name) {
            name.default = settings.defaultWebhookName;
            if (!('x-ms-summary' in name)) {
                name['x-ms-summary'] = 'Webhook Name';
            }
            messages.push(`Added default value to ${settings.requestModel}.webhook.name`);
        }
    }

    /**
     * Augments a file, in place unless `outputPath` is given
     */
    static async processFile(inputPath: string, outputPath: string | undefined, settings: WebhookSettings): Promise<AugmentResult> {
        const { content } = await FileParserService.parseDocumentFile(inputPath);

        const result = this.augmentDocument(content, settings);
        result.messages.forEach(message => console.log(message));

        if (!result.success) {
            throw new Error(`Failed to augment ${inputPath}: ${result.messages[result.messages.length - 1]}`);
        }

        const target = outputPath ?? inputPath;
        await YamlFileUtils.saveDocument(target, result.document, inputPath);

        console.log(`Successfully augmented ${inputPath}`);
        console.log(outputPath ? `Output written to ${outputPath}` : 'Updated file in-place');
        return result;
    }
}
