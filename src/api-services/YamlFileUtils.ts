import { extname } from 'path';
import * as yaml from 'yaml';
import { fileApi } from '../file';
import { FileParserService } from './FileParserService';
import { JsonValue } from './swaggerTypes';

/**
 * Utility class for saving YAML and JSON documents
 */
export class YamlFileUtils {
    static toYaml(data: JsonValue): string {
        return yaml.stringify(data, { lineWidth: 0 });
    }

    static toJson(data: JsonValue): string {
        return `${JSON.stringify(data, null, 2)}\n`;
    }

    /**
     * Save data as YAML file
     */
    static async saveYamlFile(filePath: string, data: JsonValue): Promise<void> {
        const yamlContent = this.toYaml(data);
        await this.writeText(filePath, yamlContent);
    }

    static async saveJsonFile(filePath: string, data: JsonValue): Promise<void> {
        await this.writeText(filePath, this.toJson(data));
    }

    /**
     * Save data in the format implied by the extension of `formatSourcePath`
     * (the target itself by default), JSON unless it is YAML
     */
    static async saveDocument(filePath: string, data: JsonValue, formatSourcePath: string = filePath): Promise<void> {
        if (FileParserService.isYamlFile(extname(formatSourcePath))) {
            await this.saveYamlFile(filePath, data);
        } else {
            await this.saveJsonFile(filePath, data);
        }
    }

    static async writeText(filePath: string, text: string): Promise<void> {
        const bytes = new TextEncoder().encode(text);
        await fileApi.writeFile(filePath, bytes);
    }
}
