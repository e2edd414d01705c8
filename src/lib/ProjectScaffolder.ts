import path from 'path';
import chalk from 'chalk';
import { FileSystem } from './FileSystem';
import { AlreadyExistsError, InvalidManifestError } from './errors';
import { renderTemplate, PlaceholderValues } from './TemplateRenderer';
import { ScaffoldSpec } from './types';
import { splitRelativePath, validateProjectName } from './utils';

export interface ScaffoldOptions {
    /** Proceed into a non-empty target directory, overwriting the files the spec names. */
    force?: boolean;
    /** Log every directory and file as it is created. */
    verbose?: boolean;
}

// A resolved unit of work; templates are rendered before anything touches the disk.
type PlannedStep =
    | { kind: 'mkdir'; relPath: string; absPath: string }
    | { kind: 'write'; relPath: string; absPath: string; content: string };

export class ProjectScaffolder {
    private fs: FileSystem;
    private spec: ScaffoldSpec;

    constructor(fs: FileSystem, spec: ScaffoldSpec) {
        this.fs = fs;
        this.spec = spec;
    }

    /**
     * Materializes the scaffold at `<root>/<name>`.
     *
     * The first failure stops generation and is rethrown; whatever was already
     * written stays on disk.
     *
     * @returns The absolute path of the generated project directory.
     * @throws InvalidNameError, AlreadyExistsError, TemplateError or IOFailureError.
     */
    async generate(root: string, name: string, options: ScaffoldOptions = {}): Promise<string> {
        validateProjectName(name);
        const projectPath = path.resolve(root, name);

        await this.assertTargetAvailable(projectPath, options.force ?? false);
        const steps = this.plan(projectPath, { project_name: name });

        const label = this.spec.description ? `${this.spec.name} (${this.spec.description})` : this.spec.name;
        console.log(chalk.cyan(`\nScaffolding ${label} project at ${projectPath}...`));
        await this.fs.ensureDirExists(projectPath);

        for (const step of steps) {
            if (step.kind === 'mkdir') {
                await this.fs.ensureDirExists(step.absPath);
            } else {
                await this.fs.writeFile(step.absPath, step.content);
            }
            if (options.verbose) {
                console.log(chalk.dim(`  ${step.kind === 'mkdir' ? 'created' : 'wrote  '} ${step.relPath}`));
            }
        }

        console.log(chalk.green(`Project generated at: ${projectPath}`));
        return projectPath;
    }

    private async assertTargetAvailable(projectPath: string, force: boolean): Promise<void> {
        const stats = await this.fs.stat(projectPath);
        if (stats === null) return;

        if (!stats.isDirectory()) {
            throw new AlreadyExistsError(projectPath);
        }
        if (await this.fs.isDirectoryEmpty(projectPath)) return;

        if (!force) {
            throw new AlreadyExistsError(projectPath);
        }
        console.log(chalk.yellow(`Target ${projectPath} is not empty; overwriting scaffold files (--force).`));
    }

    private plan(projectPath: string, values: PlaceholderValues): PlannedStep[] {
        return this.spec.entries.map((entry): PlannedStep => {
            const absPath = this.resolveInside(projectPath, entry.path);
            if (entry.type === 'directory') {
                return { kind: 'mkdir', relPath: entry.path, absPath };
            }
            const content = entry.content.kind === 'templated'
                ? renderTemplate(entry.path, entry.content.text, values)
                : entry.content.text;
            return { kind: 'write', relPath: entry.path, absPath, content };
        });
    }

    private resolveInside(projectPath: string, relPath: string): string {
        const segments = splitRelativePath(relPath);
        const absPath = segments === null ? null : path.join(projectPath, ...segments);
        if (absPath === null || !absPath.startsWith(projectPath + path.sep)) {
            const source = this.spec.manifestPath ?? `(built-in spec '${this.spec.name}')`;
            throw new InvalidManifestError(source, `entry '${relPath}' escapes the project directory`);
        }
        return absPath;
    }
}
