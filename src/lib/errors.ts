// File: src/lib/errors.ts

export type ScaffoldErrorCode =
    | 'InvalidName'
    | 'AlreadyExists'
    | 'IOFailure'
    | 'TemplateError'
    | 'InvalidManifest';

export type FileOperation = 'mkdir' | 'write' | 'read' | 'stat' | 'readdir';

/**
 * Base class for every failure the scaffolder reports. All of them are terminal:
 * the CLI prints the message and exits non-zero.
 */
export abstract class ScaffoldError extends Error {
    abstract readonly code: ScaffoldErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidNameError extends ScaffoldError {
    readonly code = 'InvalidName';

    constructor(readonly projectName: string, reason: string) {
        super(`Invalid project name ${JSON.stringify(projectName)}: ${reason}`);
    }
}

export class AlreadyExistsError extends ScaffoldError {
    readonly code = 'AlreadyExists';

    constructor(readonly path: string) {
        super(`Target path already exists and is not empty: ${path}`);
    }
}

export class IOFailureError extends ScaffoldError {
    readonly code = 'IOFailure';

    constructor(readonly path: string, readonly operation: FileOperation, cause: unknown) {
        super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
    }
}

export class TemplateError extends ScaffoldError {
    readonly code = 'TemplateError';

    constructor(readonly path: string, readonly placeholder: string, reason: string) {
        super(`Template ${path}: placeholder '${placeholder}' ${reason}`);
    }
}

export class InvalidManifestError extends ScaffoldError {
    readonly code = 'InvalidManifest';

    /**
     * @param source The manifest file, or a label for a spec built in code.
     */
    constructor(readonly source: string, reason: string) {
        super(`Invalid scaffold manifest ${source}: ${reason}`);
    }
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
