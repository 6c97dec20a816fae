import { forEachOperation } from '../api-services/transformers';
import { getString, SwaggerDocument } from '../api-services/swaggerTypes';
import { ConnectorConfig } from './ConnectorConfigService';

interface OperationSummary {
    title: string;
    description?: string;
    trigger: boolean;
}

/**
 * Generates README.md following the certified connector template
 */
export class ReadmeGenerator {

    static generate(config: ConnectorConfig, document: SwaggerDocument): string {
        const lines: string[] = [];

        lines.push(`# ${config.displayName}`);
        lines.push('');
        lines.push(config.description.trim());
        lines.push('');

        lines.push('## Publisher');
        lines.push('');
        lines.push(config.publisher);
        lines.push('');

        lines.push('## Prerequisites');
        lines.push('');
        for (const prerequisite of config.prerequisites) {
            lines.push(`- ${prerequisite}`);
        }
        lines.push('');

        const operations = this.collectOperations(document);
        if (operations.length > 0) {
            lines.push('## Supported Operations');
            lines.push('');
            for (const operation of operations) {
                lines.push(operation.description
                    ? `- **${operation.title}**: ${operation.description}`
                    : `- **${operation.title}**`);
            }
            lines.push('');
        }

        lines.push('## Obtaining Credentials');
        lines.push('');
        lines.push(config.authentication.description);
        lines.push('');
        if (config.authentication.tooltip !== undefined) {
            lines.push(config.authentication.tooltip);
            lines.push('');
        }

        if (config.gettingStarted) {
            lines.push('## Getting Started');
            lines.push('');
            lines.push(config.gettingStarted.trim());
            lines.push('');
        }

        lines.push('## Known Issues and Limitations');
        lines.push('');
        for (const limitation of config.knownLimitations) {
            lines.push(`- ${limitation}`);
        }
        lines.push('');

        if (config.deploymentInstructions) {
            lines.push('## Deployment Instructions');
            lines.push('');
            lines.push(config.deploymentInstructions.trim());
            lines.push('');
        }

        return lines.join('\n');
    }

    /**
     * Named operations a connector user can see, triggers first
     */
    static collectOperations(document: SwaggerDocument): OperationSummary[] {
        const operations: OperationSummary[] = [];

        forEachOperation(document, operation => {
            const title = getString(operation, 'summary') ?? getString(operation, 'operationId');
            if (operation['x-ms-visibility'] === 'internal' || title === undefined) {
                return;
            }
            operations.push({
                title,
                description: getString(operation, 'description'),
                trigger: 'x-ms-trigger' in operation
            });
        });

        return [
            ...operations.filter(operation => operation.trigger),
            ...operations.filter(operation => !operation.trigger)
        ];
    }
}
