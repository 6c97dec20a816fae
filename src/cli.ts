#!/usr/bin/env node
import { resolve } from 'path';
import { SwaggerCleanerService } from './api-services/SwaggerCleanerService';
import { TriggerAugmenterService } from './api-services/TriggerAugmenterService';
import {
    CertificationPackagerService,
    PackageValidator,
    PipelineRunner,
    PipelineSettings,
    PipelineSettingsService
} from './services';

export const USAGE = `Usage: connector-cert <command> [arguments]

Commands:
  clean <input> [output] [--config <file>]
      Filter, clean and annotate a Swagger 2.0 definition
  list-endpoints <input>
      Print every <path>/<method> of a definition
  augment <input> [output] [--config <file>]
      Add Power Automate webhook trigger extensions (in place without output)
  package <swagger> <config> <outputDir>
      Write apiDefinition.swagger.json, apiProperties.json and README.md
  validate <connectorFile> <packageDir> <displayName> [--config <file>]
      Check a connector file and its certification package
  pipeline <input> --config <file> [--work-dir <dir>] [--skip-validate]
      Run clean, augment, package and validate in one go
  help
      Show this message`;

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    options: Map<string, string>;
    flags: Set<string>;
}

const VALUE_OPTIONS = new Set(['--config', '--work-dir']);

export function parseArgs(argv: string[]): ParsedArgs {
    const positionals: string[] = [];
    const options = new Map<string, string>();
    const flags = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (VALUE_OPTIONS.has(arg)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`Option ${arg} requires a value`);
            }
            options.set(arg, value);
            i++;
        } else if (arg.startsWith('-')) {
            flags.add(arg);
        } else {
            positionals.push(arg);
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, options, flags };
}

async function loadSettings(configPath: string | undefined): Promise<PipelineSettings> {
    if (!configPath) {
        return PipelineSettingsService.getDefaultSettings();
    }
    return PipelineSettingsService.getInstance().loadFromConnectorConfig(configPath);
}

class UsageError extends Error {}

function requirePositionals(args: ParsedArgs, count: number): void {
    if (args.positionals.length < count) {
        throw new UsageError(`${args.command} expects at least ${count} argument(s)`);
    }
}

async function execute(args: ParsedArgs): Promise<number> {
    const [first, second, third] = args.positionals;
    const configPath = args.options.get('--config');

    switch (args.command) {
        case 'clean': {
            requirePositionals(args, 1);
            await SwaggerCleanerService.processFile(first, second, await loadSettings(configPath));
            return 0;
        }
        case 'list-endpoints': {
            requirePositionals(args, 1);
            const endpoints = await SwaggerCleanerService.listAvailableEndpoints(first);
            console.log(`Available endpoints in ${first}:`);
            endpoints.forEach(endpoint => console.log(`  ${endpoint}`));
            console.log(`Total: ${endpoints.length} endpoints`);
            return 0;
        }
        case 'augment': {
            requirePositionals(args, 1);
            const settings = await loadSettings(configPath);
            await TriggerAugmenterService.processFile(first, second, settings.webhook);
            return 0;
        }
        case 'package': {
            requirePositionals(args, 3);
            await CertificationPackagerService.generatePackage(first, second, third);
            return 0;
        }
        case 'validate': {
            requirePositionals(args, 3);
            const settings = await loadSettings(configPath);
            const report = await PackageValidator.validatePackage({
                connectorFile: first,
                packageDir: second,
                displayName: third,
                payloadModel: settings.webhook.payloadModel
            });
            PackageValidator.printReport(report);
            return report.valid ? 0 : 1;
        }
        case 'pipeline': {
            requirePositionals(args, 1);
            if (!configPath) {
                throw new UsageError('pipeline requires --config <file>');
            }
            const result = await PipelineRunner.run({
                input: first,
                configPath,
                workDir: args.options.get('--work-dir') ?? resolve('build'),
                skipValidate: args.flags.has('--skip-validate')
            });
            console.log(result.success ? '✓ Pipeline completed successfully!' : '✗ Pipeline failed');
            return result.success ? 0 : 1;
        }
        default:
            throw new UsageError(`Unknown command: ${args.command}`);
    }
}

export async function runCli(argv: string[]): Promise<number> {
    try {
        const args = parseArgs(argv);
        const helpRequested = args.command === 'help' || args.flags.has('-h') || args.flags.has('--help');
        if (!args.command || helpRequested) {
            console.log(USAGE);
            return helpRequested ? 0 : 1;
        }
        return await execute(args);
    } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
        if (error instanceof UsageError) {
            console.error(USAGE);
        }
        return 1;
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(error);
            process.exitCode = 1;
        });
}
