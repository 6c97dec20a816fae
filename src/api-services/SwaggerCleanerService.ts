import { extname } from 'path';
import { PipelineSettings } from '../services/settingsTypes';
import { FileParserService } from './FileParserService';
import { cloneDocument, SwaggerDocument } from './swaggerTypes';
import {
    countEndpoints,
    enhanceEndpoints,
    filterEndpoints,
    fixInfoSection,
    keepOnlySuccessResponses,
    listEndpoints,
    makeWebhookUrlRequired,
    normalizeEndpointKey,
    removeAnyOfOneOf,
    removeSiblingsOfRefs,
    removeUnusedModels
} from './transformers';
import { YamlFileUtils } from './YamlFileUtils';

export interface CleanResult {
    document: SwaggerDocument;
    removedModels: string[];
    endpointCount: number;
    requestedEndpointCount: number;
    /** Allow-listed endpoints the input did not contain */
    missingEndpoints: string[];
}

export class SwaggerCleanerService {

    /**
     * Runs the cleaning passes in order. Responses are trimmed before models
     * are pruned so that error-only models go too.
     */
    static cleanDocument(input: SwaggerDocument, settings: PipelineSettings): CleanResult {
        const available = new Set(listEndpoints(input));

        let document = filterEndpoints(cloneDocument(input), settings.endpointsToKeep);
        document = keepOnlySuccessResponses(document);

        const pruned = removeUnusedModels(document);
        document = pruned.document;

        document = fixInfoSection(document, settings.info);
        document = makeWebhookUrlRequired(document, settings.webhook);
        document = enhanceEndpoints(document);
        document = removeSiblingsOfRefs(document);
        document = removeAnyOfOneOf(document);

        return {
            document,
            removedModels: pruned.removedModels,
            endpointCount: countEndpoints(document),
            requestedEndpointCount: settings.endpointsToKeep.length,
            missingEndpoints: settings.endpointsToKeep.filter(endpoint => !available.has(normalizeEndpointKey(endpoint)))
        };
    }

    /**
     * `spec.yaml` becomes `spec-cleaned.yaml`
     */
    static defaultOutputPath(inputPath: string): string {
        const extension = extname(inputPath);
        const base = extension ? inputPath.slice(0, -extension.length) : inputPath;
        return `${base}-cleaned${extension}`;
    }

    static async processFile(inputPath: string, outputPath: string | undefined, settings: PipelineSettings): Promise<CleanResult> {
        const target = outputPath ?? this.defaultOutputPath(inputPath);
        const { content } = await FileParserService.parseDocumentFile(inputPath);

        const result = this.cleanDocument(content, settings);

        if (result.removedModels.length > 0) {
            console.log(`Removed ${result.removedModels.length} unused model(s): ${result.removedModels.join(', ')}`);
        }

        await YamlFileUtils.saveDocument(target, result.document, inputPath);

        if (result.requestedEndpointCount > 0) {
            console.log(`Successfully processed ${inputPath} -> ${target}`);
            console.log(`Filtered to ${result.endpointCount} endpoints out of ${result.requestedEndpointCount} specified`);
            console.log('Added descriptions and capitalized operationIds');

            if (result.missingEndpoints.length > 0) {
                console.warn('[SwaggerCleanerService] Some specified endpoints were not found in the input file:');
                result.missingEndpoints.forEach(endpoint => console.warn(`  - ${endpoint}`));
                console.warn('Use list-endpoints to see available endpoints.');
            }
        } else {
            console.log(`Successfully processed ${inputPath} -> ${target} (all endpoints kept)`);
            console.log('Added descriptions and capitalized operationIds');
        }

        return result;
    }

    static async listAvailableEndpoints(inputPath: string): Promise<string[]> {
        const { content } = await FileParserService.parseDocumentFile(inputPath);
        return listEndpoints(content);
    }
}
