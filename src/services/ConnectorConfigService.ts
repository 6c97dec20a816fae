import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { FileParserService } from '../api-services/FileParserService';
import { isJsonObject, JsonObject, JsonValue } from '../api-services/swaggerTypes';
import {
    AUTHENTICATION_REQUIRED_FIELDS,
    CONNECTOR_CONFIG_REQUIRED_FIELDS,
    CONNECTOR_CONFIG_SCHEMA,
    ValidationError
} from './connectorSchemas';
import { PipelineSettingsOverrides } from './settingsTypes';

export interface AuthenticationConfig {
    type: string;
    displayName: string;
    description: string;
    tooltip?: string;
    parameterName?: string;
}

export interface HostUrlConfig {
    displayName: string;
    description: string;
    tooltip?: string;
    /** Defaults to `https://@connectionParameters('hostUrl')` */
    urlTemplate?: string;
}

export interface ConnectorConfig {
    publisher: string;
    displayName: string;
    description: string;
    iconBrandColor: string;
    supportEmail: string;
    authentication: AuthenticationConfig;
    prerequisites: string[];
    knownLimitations: string[];
    gettingStarted?: string;
    deploymentInstructions?: string;
    capabilities?: string[];
    hostUrl?: HostUrlConfig;
    pipeline?: PipelineSettingsOverrides;
}

export interface ConfigValidationResult {
    valid: boolean;
    errors: ValidationError[];
    config?: ConnectorConfig;
}

function isBlank(value: JsonValue | undefined): boolean {
    if (value === undefined || value === null || value === '' || value === false || value === 0) {
        return true;
    }
    if (Array.isArray(value)) {
        return value.length === 0;
    }
    return isJsonObject(value) && Object.keys(value).length === 0;
}

export class ConnectorConfigService {
    private static ajv: Ajv;
    private static validateSchema: ValidateFunction<ConnectorConfig>;

    static {
        this.ajv = new Ajv({ allErrors: true });
        addFormats(this.ajv);
        this.validateSchema = this.ajv.compile<ConnectorConfig>(CONNECTOR_CONFIG_SCHEMA);
    }

    /**
     * Loads connector-config.yaml and validates it, throwing on the first problem set
     */
    static async loadConfig(configPath: string): Promise<ConnectorConfig> {
        const { content } = await FileParserService.parseDocumentFile(configPath);
        const result = this.validateConfig(content);
        if (!result.valid || !result.config) {
            const details = result.errors
                .map(error => error.path === 'root' ? error.message : `${error.path}: ${error.message}`)
                .join('; ');
            throw new Error(`Invalid connector config ${configPath}: ${details}`);
        }
        return result.config;
    }

    static validateConfig(content: JsonObject): ConfigValidationResult {
        const missingFields = CONNECTOR_CONFIG_REQUIRED_FIELDS.filter(field => isBlank(content[field]));
        if (missingFields.length > 0) {
            return {
                valid: false,
                errors: [{
                    path: 'root',
                    message: `Missing required fields in connector config: ${missingFields.join(', ')}`
                }]
            };
        }

        const authentication = content.authentication;
        if (isJsonObject(authentication)) {
            const missingAuthFields = AUTHENTICATION_REQUIRED_FIELDS.filter(field => isBlank(authentication[field]));
            if (missingAuthFields.length > 0) {
                return {
                    valid: false,
                    errors: [{
                        path: '/authentication',
                        message: `Missing required authentication fields: ${missingAuthFields.join(', ')}`
                    }]
                };
            }
        }

        if (!this.validateSchema(content)) {
            const errors: ValidationError[] = (this.validateSchema.errors ?? []).map(err => ({
                path: err.instancePath || 'root',
                message: err.message || 'Validation error'
            }));
            return { valid: false, errors };
        }

        return { valid: true, errors: [], config: content };
    }
}
