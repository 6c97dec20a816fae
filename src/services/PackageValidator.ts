import SwaggerParser from '@apidevtools/swagger-parser';
import { join } from 'path';
import { FileParserService } from '../api-services/FileParserService';
import { getArray, getObject, getString, isJsonObject, JsonObject, JsonValue } from '../api-services/swaggerTypes';
import { fileApi } from '../file';
import { DYNAMIC_HOST_URL_TEMPLATE_ID, HOST_URL_PARAMETER, URL_TEMPLATE_PARAMETER } from './ApiPropertiesGenerator';
import { API_DEFINITION_FILE, API_PROPERTIES_FILE, README_FILE } from './CertificationPackagerService';
import { BRAND_COLOR_PATTERN } from './connectorSchemas';
import { DEFAULT_PIPELINE_SETTINGS } from './pipelineDefaults';

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface ValidationCheck {
    step: string;
    status: CheckStatus;
    message: string;
}

export interface PackageValidationOptions {
    /** The cleaned and augmented connector document */
    connectorFile: string;
    packageDir: string;
    displayName: string;
    /** Definition the trigger payload points at */
    payloadModel?: string;
}

export interface PackageValidationReport {
    valid: boolean;
    checks: ValidationCheck[];
}

const REQUIRED_SWAGGER_FIELDS = ['swagger', 'info', 'paths', 'host'];
const COMPOSITION_KEYWORDS = ['oneOf', 'anyOf', 'allOf'];
const TRIGGER_EXTENSIONS = ['x-ms-trigger', 'x-ms-notification-url', 'x-ms-notification-content'];
const REQUIRED_README_SECTIONS = ['## Publisher', '## Prerequisites', '## Known Issues and Limitations'];
const MIN_README_SIZE = 500;

function countKeys(value: JsonValue, keys: readonly string[]): number {
    if (Array.isArray(value)) {
        return value.reduce<number>((total, item) => total + countKeys(item, keys), 0);
    }
    if (!isJsonObject(value)) {
        return 0;
    }
    let count = 0;
    for (const [key, item] of Object.entries(value)) {
        if (keys.includes(key)) {
            count++;
        }
        count += countKeys(item, keys);
    }
    return count;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Checks a generated certification package and the connector document it
 * was built from. Problems are reported as failed checks, never thrown.
 */
export class PackageValidator {

    static async validatePackage(options: PackageValidationOptions): Promise<PackageValidationReport> {
        const checks: ValidationCheck[] = [];
        const apiDefinitionPath = join(options.packageDir, API_DEFINITION_FILE);
        const apiPropertiesPath = join(options.packageDir, API_PROPERTIES_FILE);
        const readmePath = join(options.packageDir, README_FILE);

        const present = await this.checkRequiredFiles(
            [options.connectorFile, apiDefinitionPath, apiPropertiesPath, readmePath],
            checks
        );

        if (present.has(options.connectorFile)) {
            const connector = await this.loadDocument('Connector structure', options.connectorFile, checks);
            if (connector) {
                this.checkStructure(connector, checks);
                this.checkComposition(connector, checks);
                this.checkTriggerExtensions(connector, options.payloadModel ?? DEFAULT_PIPELINE_SETTINGS.webhook.payloadModel, checks);
            }
        }

        if (present.has(apiDefinitionPath)) {
            await this.checkSwaggerDefinition(apiDefinitionPath, checks);
        }

        if (present.has(apiPropertiesPath)) {
            const apiProperties = await this.loadDocument('API properties', apiPropertiesPath, checks);
            if (apiProperties) {
                this.checkApiProperties(apiProperties, checks);
            }
        }

        if (present.has(readmePath)) {
            await this.checkReadme(readmePath, options.displayName, checks);
        }

        return {
            valid: checks.every(check => check.status !== 'fail'),
            checks
        };
    }

    static printReport(report: PackageValidationReport): void {
        let step = '';
        for (const check of report.checks) {
            if (check.step !== step) {
                step = check.step;
                console.log(`${step}:`);
            }
            const symbol = check.status === 'pass' ? '✓' : check.status === 'warn' ? '⚠' : '✗';
            console.log(`  ${symbol} ${check.message}`);
        }
        console.log(report.valid ? '✓ ALL VALIDATIONS PASSED' : '✗ VALIDATION FAILED');
    }

    private static async checkRequiredFiles(files: string[], checks: ValidationCheck[]): Promise<Set<string>> {
        const present = new Set<string>();
        for (const file of files) {
            if (await fileApi.exists(file)) {
                present.add(file);
                checks.push({ step: 'Required files', status: 'pass', message: `${file} exists` });
            } else {
                checks.push({ step: 'Required files', status: 'fail', message: `${file} not found` });
            }
        }
        return present;
    }

    private static async loadDocument(step: string, filePath: string, checks: ValidationCheck[]): Promise<JsonObject | undefined> {
        try {
            const { content } = await FileParserService.parseDocumentFile(filePath);
            return content;
        } catch (error) {
            checks.push({ step, status: 'fail', message: describeError(error) });
            return undefined;
        }
    }

    private static checkStructure(document: JsonObject, checks: ValidationCheck[]): void {
        const step = 'Connector structure';
        const version = document.swagger;
        if (version === '2.0') {
            checks.push({ step, status: 'pass', message: 'Correct Swagger version: 2.0' });
        } else {
            checks.push({ step, status: 'fail', message: `Incorrect Swagger version: ${version === undefined ? 'none' : String(version)}` });
        }

        for (const field of REQUIRED_SWAGGER_FIELDS) {
            if (field in document) {
                checks.push({ step, status: 'pass', message: `${field} present` });
            } else {
                checks.push({ step, status: 'fail', message: `${field} missing` });
            }
        }
    }

    private static checkComposition(document: JsonObject, checks: ValidationCheck[]): void {
        const step = 'Power Automate compatibility';
        const count = countKeys(document, COMPOSITION_KEYWORDS);
        if (count > 0) {
            checks.push({ step, status: 'warn', message: `Found ${count} potentially incompatible features (oneOf/anyOf/allOf)` });
        } else {
            checks.push({ step, status: 'pass', message: 'No known incompatible features found' });
        }
    }

    private static checkTriggerExtensions(document: JsonObject, payloadModel: string, checks: ValidationCheck[]): void {
        const step = 'Trigger extensions';
        for (const extension of TRIGGER_EXTENSIONS) {
            if (countKeys(document, [extension]) > 0) {
                checks.push({ step, status: 'pass', message: `${extension} extension found` });
            } else {
                checks.push({ step, status: 'fail', message: `${extension} extension missing` });
            }
        }

        const definitions = getObject(document, 'definitions');
        if (definitions && payloadModel in definitions) {
            checks.push({ step, status: 'pass', message: `${payloadModel} schema defined` });
        } else {
            checks.push({ step, status: 'fail', message: `${payloadModel} schema missing` });
        }
    }

    private static async checkSwaggerDefinition(filePath: string, checks: ValidationCheck[]): Promise<void> {
        const step = 'API definition';
        try {
            await SwaggerParser.validate(filePath);
            checks.push({ step, status: 'pass', message: 'Swagger 2.0 validation passed' });
        } catch (error) {
            checks.push({ step, status: 'fail', message: `Swagger 2.0 validation failed: ${describeError(error)}` });
        }
    }

    private static checkApiProperties(document: JsonObject, checks: ValidationCheck[]): void {
        const step = 'API properties';
        const properties = getObject(document, 'properties') ?? {};

        const connectionParameters = getObject(properties, 'connectionParameters');
        if (!connectionParameters) {
            checks.push({ step, status: 'fail', message: 'connectionParameters field missing' });
        } else {
            checks.push({ step, status: 'pass', message: 'connectionParameters field present' });
            const hostUrl = getObject(connectionParameters, HOST_URL_PARAMETER);
            if (!hostUrl) {
                checks.push({ step, status: 'warn', message: 'hostUrl connection parameter not configured' });
            } else if ('type' in hostUrl && 'uiDefinition' in hostUrl) {
                checks.push({ step, status: 'pass', message: 'hostUrl parameter has required fields' });
            } else {
                checks.push({ step, status: 'fail', message: 'hostUrl parameter missing required fields' });
            }
        }

        const policies = getArray(properties, 'policyTemplateInstances');
        if (!policies) {
            checks.push({ step, status: 'fail', message: 'policyTemplateInstances field missing' });
        } else {
            checks.push({ step, status: 'pass', message: 'policyTemplateInstances field present' });
            this.checkHostUrlPolicy(policies, checks);
        }

        const brandColor = getString(properties, 'iconBrandColor');
        if (brandColor === undefined) {
            checks.push({ step, status: 'fail', message: 'iconBrandColor field missing' });
        } else if (new RegExp(BRAND_COLOR_PATTERN).test(brandColor)) {
            checks.push({ step, status: 'pass', message: `iconBrandColor valid: ${brandColor}` });
        } else {
            checks.push({ step, status: 'fail', message: `iconBrandColor invalid format: ${brandColor}` });
        }
    }

    private static checkHostUrlPolicy(policies: JsonValue[], checks: ValidationCheck[]): void {
        const step = 'API properties';
        const policy = policies.find(item => isJsonObject(item) && item.templateId === DYNAMIC_HOST_URL_TEMPLATE_ID);
        if (!isJsonObject(policy)) {
            checks.push({ step, status: 'warn', message: 'dynamichosturl policy template not configured' });
            return;
        }

        const parameters = getObject(policy, 'parameters');
        const urlTemplate = parameters ? getString(parameters, URL_TEMPLATE_PARAMETER) : undefined;
        if (urlTemplate === undefined) {
            checks.push({ step, status: 'fail', message: 'dynamichosturl policy missing urlTemplate parameter' });
        } else if (urlTemplate.startsWith('https://') && urlTemplate.includes('@connectionParameters(')) {
            checks.push({ step, status: 'pass', message: `dynamichosturl URL template valid: ${urlTemplate}` });
        } else {
            checks.push({ step, status: 'fail', message: `dynamichosturl URL template invalid: ${urlTemplate}` });
        }
    }

    private static async checkReadme(filePath: string, displayName: string, checks: ValidationCheck[]): Promise<void> {
        const step = 'README';
        let content: string;
        let size: number;
        try {
            content = await fileApi.readFileContent(filePath);
            size = await fileApi.getFileSize(filePath);
        } catch (error) {
            checks.push({ step, status: 'fail', message: `Failed to read ${filePath}: ${describeError(error)}` });
            return;
        }

        const lines = content.split(/\r?\n/);
        const title = `# ${displayName}`;
        if (lines.includes(title)) {
            checks.push({ step, status: 'pass', message: 'README has correct title' });
        } else {
            checks.push({ step, status: 'fail', message: `README missing title '${title}'` });
        }

        for (const section of REQUIRED_README_SECTIONS) {
            if (lines.some(line => line.startsWith(section))) {
                checks.push({ step, status: 'pass', message: `${section} section found` });
            } else {
                checks.push({ step, status: 'fail', message: `${section} section missing` });
            }
        }

        if (size < MIN_README_SIZE) {
            checks.push({ step, status: 'fail', message: `README.md is too small (${size} bytes)` });
        } else {
            checks.push({ step, status: 'pass', message: `README.md size is reasonable (${size} bytes)` });
        }
    }
}
