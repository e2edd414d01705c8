#!/usr/bin/env node
// src/scaffold.ts
import { Command } from 'commander';
import chalk from 'chalk';
import { FileSystem } from './lib/FileSystem';
import { ProjectScaffolder } from './lib/ProjectScaffolder';
import { loadScaffoldSpec } from './lib/ScaffoldManifest';
import { ScaffoldError } from './lib/errors';
import { GenerationRequest } from './lib/types';
import { DEFAULT_TEMPLATE_DIR } from './lib/config_defaults';
import { NAME, VERSION } from './version';

interface CliOptions {
    path: string;
    name: string;
    force: boolean;
    verbose: boolean;
}

/**
 * Loads the scaffold from `templateDir` and generates the requested project.
 * Errors are reported on stderr and turned into a non-zero exit code.
 */
export async function runScaffold(
    request: GenerationRequest,
    verbose: boolean,
    templateDir: string = DEFAULT_TEMPLATE_DIR
): Promise<number> {
    const fs = new FileSystem();
    try {
        const spec = await loadScaffoldSpec(fs, templateDir);
        const scaffolder = new ProjectScaffolder(fs, spec);
        await scaffolder.generate(request.root, request.name, { force: request.force, verbose });
        return 0;
    } catch (error) {
        if (error instanceof ScaffoldError) {
            console.error(chalk.red(`Error: ${error.message}`));
        } else {
            console.error(chalk.red('Unexpected error while scaffolding:'), error);
        }
        return 1;
    }
}

export function createCLI(templateDir: string = DEFAULT_TEMPLATE_DIR): Command {
    const program = new Command();

    program
        .name(NAME)
        .version(VERSION)
        .description('Scaffold a DDD-layered FastAPI service project')
        .requiredOption('-p, --path <directory>', 'Path to generate the project in (created if absent)')
        .requiredOption('-n, --name <name>', 'Project name; becomes the top-level directory')
        .option('-f, --force', 'Proceed into a non-empty target, overwriting scaffold files', false)
        .option('-v, --verbose', 'Log every created directory and file', false)
        .action(async (options: CliOptions) => {
            const request: GenerationRequest = { root: options.path, name: options.name, force: options.force };
            process.exitCode = await runScaffold(request, options.verbose, templateDir);
        });

    return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
    await createCLI().parseAsync(argv);
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error(chalk.red('Fatal error:'), error);
        process.exitCode = 1;
    });
}
