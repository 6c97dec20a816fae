import { JsonObject } from '../api-services/swaggerTypes';
import { ConnectorConfig } from './ConnectorConfigService';

export const HOST_URL_PARAMETER = 'hostUrl';
export const DYNAMIC_HOST_URL_TEMPLATE_ID = 'dynamichosturl';
export const URL_TEMPLATE_PARAMETER = 'x-ms-apimTemplateParameter.urlTemplate';

const DEFAULT_API_KEY_PARAMETER = 'api_key';

/**
 * Builds apiProperties.json: connection parameters, branding colour,
 * capabilities and policy templates
 */
export class ApiPropertiesGenerator {

    static generate(config: ConnectorConfig): JsonObject {
        return {
            properties: {
                connectionParameters: this.buildConnectionParameters(config),
                iconBrandColor: config.iconBrandColor,
                capabilities: [...(config.capabilities ?? [])],
                policyTemplateInstances: this.buildPolicyTemplateInstances(config)
            }
        };
    }

    static buildConnectionParameters(config: ConnectorConfig): JsonObject {
        const parameters: JsonObject = {};
        const auth = config.authentication;

        if (auth.type === 'apiKey') {
            parameters[auth.parameterName ?? DEFAULT_API_KEY_PARAMETER] = {
                type: 'securestring',
                uiDefinition: {
                    displayName: auth.displayName,
                    description: auth.description,
                    tooltip: auth.tooltip ?? auth.description,
                    constraints: {
                        required: 'true'
                    }
                }
            };
        } else {
            console.warn(`[ApiPropertiesGenerator] Authentication type "${auth.type}" has no connection parameter mapping`);
        }

        if (config.hostUrl) {
            parameters[HOST_URL_PARAMETER] = {
                type: 'string',
                uiDefinition: {
                    displayName: config.hostUrl.displayName,
                    description: config.hostUrl.description,
                    tooltip: config.hostUrl.tooltip ?? config.hostUrl.description,
                    constraints: {
                        required: 'true'
                    }
                }
            };
        }

        return parameters;
    }

    static buildPolicyTemplateInstances(config: ConnectorConfig): JsonObject[] {
        if (!config.hostUrl) {
            return [];
        }
        return [{
            templateId: DYNAMIC_HOST_URL_TEMPLATE_ID,
            title: 'Set host URL',
            parameters: {
                [URL_TEMPLATE_PARAMETER]: config.hostUrl.urlTemplate ?? `https://@connectionParameters('${HOST_URL_PARAMETER}')`
            }
        }];
    }
}
