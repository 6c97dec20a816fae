import * as yaml from 'js-yaml';
import { fileApi } from '../file';
import { JsonObject, toJsonObject } from './swaggerTypes';

export type DocumentFormat = 'json' | 'yaml' | 'unknown';

export interface ParsedFileContent {
    content: JsonObject;
    format: DocumentFormat;
}

// Core schema keeps timestamps as strings; merge keys (`<<: *anchor`) still resolve
const YAML_SCHEMA = yaml.CORE_SCHEMA.extend([yaml.types.merge]);

const YAML_ROOT_KEYS = ['swagger:', 'openapi:', 'info:', 'paths:', 'publisher:', 'displayName:'];

export class FileParserService {
    private static readonly JSON_EXTENSIONS = ['.json'];
    private static readonly YAML_EXTENSIONS = ['.yaml', '.yml'];

    /**
     * Reads a JSON or YAML document from disk
     */
    static async parseDocumentFile(filePath: string): Promise<ParsedFileContent> {
        let content: string;
        try {
            content = await fileApi.readFileContent(filePath);
        } catch (error) {
            throw new Error(`Failed to read file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
        return this.parseContent(content, filePath);
    }

    /**
     * Parses file content based on file extension and content analysis
     */
    static parseContent(content: string, fileName: string): ParsedFileContent {
        try {
            const format = this.detectFormat(fileName, content);

            if (format === 'json') {
                return {
                    content: toJsonObject(JSON.parse(content), 'Document root'),
                    format
                };
            } else if (format === 'yaml') {
                return {
                    content: toJsonObject(yaml.load(content, { schema: YAML_SCHEMA }), 'Document root'),
                    format
                };
            }

            throw new Error(`Unsupported file format: ${fileName}`);
        } catch (error) {
            throw new Error(`Failed to parse file ${fileName}: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
    }

    static detectFormat(fileName: string, content: string): DocumentFormat {
        const lowerName = fileName.toLowerCase();
        if (this.isJsonFile(lowerName)) {
            return 'json';
        }
        if (this.isYamlFile(lowerName)) {
            return 'yaml';
        }
        if (this.isJsonContent(content)) {
            return 'json';
        }
        if (this.isYamlContent(content)) {
            return 'yaml';
        }
        return 'unknown';
    }

    static isYamlFile(fileName: string): boolean {
        return this.YAML_EXTENSIONS.some(ext => fileName.toLowerCase().endsWith(ext));
    }

    private static isJsonFile(fileName: string): boolean {
        return this.JSON_EXTENSIONS.some(ext => fileName.endsWith(ext));
    }

    private static isJsonContent(content: string): boolean {
        const trimmed = content.trim();
        return (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
               (trimmed.startsWith('[') && trimmed.endsWith(']'));
    }

    private static isYamlContent(content: string): boolean {
        const trimmed = content.trim();
        return trimmed.includes(':') && YAML_ROOT_KEYS.some(key => trimmed.includes(key));
    }
}
