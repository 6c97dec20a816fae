import { join } from 'path';
import { FileParserService } from '../api-services/FileParserService';
import { YamlFileUtils } from '../api-services/YamlFileUtils';
import { fileApi } from '../file';
import { ApiPropertiesGenerator } from './ApiPropertiesGenerator';
import { ConnectorConfig, ConnectorConfigService } from './ConnectorConfigService';
import { ReadmeGenerator } from './ReadmeGenerator';

export const API_DEFINITION_FILE = 'apiDefinition.swagger.json';
export const API_PROPERTIES_FILE = 'apiProperties.json';
export const README_FILE = 'README.md';

export interface CertificationPackage {
    outputDir: string;
    apiDefinitionPath: string;
    apiPropertiesPath: string;
    readmePath: string;
    config: ConnectorConfig;
}

/**
 * Writes the three files a certification submission consists of
 */
export class CertificationPackagerService {

    static async generatePackage(swaggerPath: string, configPath: string, outputDir: string): Promise<CertificationPackage> {
        console.log(`Loading configuration from ${configPath}...`);
        const config = await ConnectorConfigService.loadConfig(configPath);

        console.log(`Loading Swagger specification from ${swaggerPath}...`);
        const { content: document } = await FileParserService.parseDocumentFile(swaggerPath);

        await fileApi.createDirectory(outputDir);
        console.log(`Output directory: ${outputDir}`);
        console.log('Generating certification package files...');

        const apiDefinitionPath = join(outputDir, API_DEFINITION_FILE);
        await this.writeStep(API_DEFINITION_FILE, apiDefinitionPath,
            () => YamlFileUtils.saveJsonFile(apiDefinitionPath, document));

        const apiPropertiesPath = join(outputDir, API_PROPERTIES_FILE);
        await this.writeStep(API_PROPERTIES_FILE, apiPropertiesPath,
            () => YamlFileUtils.saveJsonFile(apiPropertiesPath, ApiPropertiesGenerator.generate(config)));

        const readmePath = join(outputDir, README_FILE);
        await this.writeStep(README_FILE, readmePath,
            () => YamlFileUtils.writeText(readmePath, ReadmeGenerator.generate(config, document)));

        console.log(`✓ Certification package generated in ${outputDir}`);

        return { outputDir, apiDefinitionPath, apiPropertiesPath, readmePath, config };
    }

    private static async writeStep(fileName: string, filePath: string, write: () => Promise<void>): Promise<void> {
        try {
            await write();
        } catch (error) {
            throw new Error(`Failed to write ${fileName}: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
        console.log(`✓ Generated: ${filePath}`);
    }
}
