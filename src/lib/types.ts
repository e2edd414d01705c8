// File: src/lib/types.ts

export interface StaticContent {
    kind: 'static';
    text: string;
}

/** Content containing `{{ placeholder }}` tokens, resolved at generation time. */
export interface TemplatedContent {
    kind: 'templated';
    text: string;
}

export type ContentSource = StaticContent | TemplatedContent;

export interface DirectoryEntry {
    type: 'directory';
    path: string; // relative to the project root, '/'-separated
}

export interface FileEntry {
    type: 'file';
    path: string; // relative to the project root, '/'-separated
    content: ContentSource;
}

export type ScaffoldEntry = DirectoryEntry | FileEntry;

/**
 * The fixed, ordered description of the tree to generate.
 * Loaded once per process and never mutated.
 */
export interface ScaffoldSpec {
    readonly name: string;
    readonly description: string;
    readonly entries: readonly ScaffoldEntry[];
    /** Set when the spec was loaded from a manifest file. */
    readonly manifestPath?: string;
}

export interface GenerationRequest {
    root: string;
    name: string;
    force: boolean;
}
