import { join } from 'path';
import { SwaggerCleanerService } from '../api-services/SwaggerCleanerService';
import { TriggerAugmenterService } from '../api-services/TriggerAugmenterService';
import { YamlFileUtils } from '../api-services/YamlFileUtils';
import { CertificationPackagerService } from './CertificationPackagerService';
import { ConnectorConfigService } from './ConnectorConfigService';
import { PackageValidationReport, PackageValidator } from './PackageValidator';
import { PipelineSettingsService } from './PipelineSettingsService';

export const CERTIFIED_CONNECTORS_DIR = 'certified-connectors';

export interface PipelineOptions {
    /** Swagger 2.0 definition to start from */
    input: string;
    configPath: string;
    workDir: string;
    skipValidate?: boolean;
}

export interface PipelineResult {
    success: boolean;
    connectorFile: string;
    packageDir: string;
    messages: string[];
    report?: PackageValidationReport;
}

/**
 * `Acme Field Data` gives `acme-field-data`
 */
export function toSlug(value: string): string {
    return value
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export class PipelineRunner {

    static connectorFileName(displayName: string): string {
        return `${toSlug(displayName)}-power-automate-connector.yaml`;
    }

    static async run(options: PipelineOptions): Promise<PipelineResult> {
        const config = await ConnectorConfigService.loadConfig(options.configPath);
        const settings = PipelineSettingsService.resolveSettings(config.pipeline);
        PipelineSettingsService.getInstance().setCurrentSettings(settings);

        const connectorFile = join(options.workDir, this.connectorFileName(config.displayName));
        const packageDir = join(options.workDir, CERTIFIED_CONNECTORS_DIR, config.displayName);

        console.log('Step 1/4: Cleaning API definition...');
        const cleaned = await SwaggerCleanerService.processFile(options.input, connectorFile, settings);

        console.log('Step 2/4: Adding trigger extensions...');
        const augmented = TriggerAugmenterService.augmentDocument(cleaned.document, settings.webhook);
        augmented.messages.forEach(message => console.log(message));
        if (!augmented.success) {
            console.error(`[PipelineRunner] Trigger augmentation failed for ${connectorFile}`);
            await YamlFileUtils.saveYamlFile(connectorFile, cleaned.document);
            return { success: false, connectorFile, packageDir, messages: augmented.messages };
        }
        await YamlFileUtils.saveYamlFile(connectorFile, augmented.document);

        console.log('Step 3/4: Packaging...');
        await CertificationPackagerService.generatePackage(connectorFile, options.configPath, packageDir);

        if (options.skipValidate) {
            console.log('Step 4/4: Validation skipped (--skip-validate)');
            return { success: true, connectorFile, packageDir, messages: augmented.messages };
        }

        console.log('Step 4/4: Validating output...');
        const report = await PackageValidator.validatePackage({
            connectorFile,
            packageDir,
            displayName: config.displayName,
            payloadModel: settings.webhook.payloadModel
        });
        PackageValidator.printReport(report);

        return { success: report.valid, connectorFile, packageDir, messages: augmented.messages, report };
    }
}
