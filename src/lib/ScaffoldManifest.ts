// File: src/lib/ScaffoldManifest.ts
import path from 'path';
import yaml from 'js-yaml';
import { FileSystem } from './FileSystem';
import { InvalidManifestError } from './errors';
import { ScaffoldEntry, ScaffoldSpec } from './types';
import { splitRelativePath } from './utils';
import { DEFAULT_TEMPLATE_DIR, MANIFEST_FILE_NAME, PAYLOAD_DIR_NAME } from './config_defaults';

// Shape of manifest.yaml. A list item is either `{ directory }` or `{ file, source, templated? }`.
type RawEntry = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `<templateDir>/manifest.yaml` and the payload files it references, producing the
 * ScaffoldSpec the scaffolder materializes. Entry paths are validated here, so the
 * scaffolder can trust every path to stay inside the project directory.
 */
export async function loadScaffoldSpec(fs: FileSystem, templateDir: string = DEFAULT_TEMPLATE_DIR): Promise<ScaffoldSpec> {
    const manifestPath = path.join(templateDir, MANIFEST_FILE_NAME);
    const raw = await fs.readFile(manifestPath);
    if (raw === null) {
        throw new InvalidManifestError(manifestPath, 'file not found');
    }

    let doc: unknown;
    try {
        doc = yaml.load(raw, { filename: manifestPath });
    } catch (error) {
        throw new InvalidManifestError(manifestPath, error instanceof Error ? error.message : String(error));
    }
    if (!isRecord(doc)) {
        throw new InvalidManifestError(manifestPath, 'expected a mapping at the top level');
    }

    const name = typeof doc.name === 'string' ? doc.name : path.basename(templateDir);
    const description = typeof doc.description === 'string' ? doc.description : '';
    const rawEntries: unknown = doc.entries;
    if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
        throw new InvalidManifestError(manifestPath, "'entries' must be a non-empty list");
    }

    const payloadDir = path.join(templateDir, PAYLOAD_DIR_NAME);
    const seen = new Set<string>();
    const entries: ScaffoldEntry[] = [];

    for (const [index, item] of rawEntries.entries()) {
        if (!isRecord(item)) {
            throw new InvalidManifestError(manifestPath, `entry #${index + 1} is not a mapping`);
        }
        const entry = await parseEntry(fs, manifestPath, payloadDir, item, index);
        if (seen.has(entry.path)) {
            throw new InvalidManifestError(manifestPath, `duplicate path '${entry.path}'`);
        }
        seen.add(entry.path);
        entries.push(entry);
    }

    return { name, description, entries, manifestPath };
}

async function parseEntry(
    fs: FileSystem,
    manifestPath: string,
    payloadDir: string,
    item: RawEntry,
    index: number
): Promise<ScaffoldEntry> {
    const label = `entry #${index + 1}`;
    const hasDirectory = typeof item.directory === 'string';
    const hasFile = typeof item.file === 'string';
    if (hasDirectory === hasFile) {
        throw new InvalidManifestError(manifestPath, `${label} must have exactly one of 'directory' or 'file'`);
    }

    const target = hasDirectory ? item.directory : item.file;
    if (typeof target !== 'string' || splitRelativePath(target) === null) {
        throw new InvalidManifestError(manifestPath, `${label} has an unsafe path '${String(target)}'`);
    }

    if (hasDirectory) {
        return { type: 'directory', path: target };
    }

    if (typeof item.source !== 'string') {
        throw new InvalidManifestError(manifestPath, `${label} ('${target}') is missing 'source'`);
    }
    const sourceSegments = splitRelativePath(item.source);
    if (sourceSegments === null) {
        throw new InvalidManifestError(manifestPath, `${label} ('${target}') has an unsafe source '${item.source}'`);
    }
    if (item.templated !== undefined && typeof item.templated !== 'boolean') {
        throw new InvalidManifestError(manifestPath, `${label} ('${target}'): 'templated' must be a boolean`);
    }

    const sourcePath = path.join(payloadDir, ...sourceSegments);
    const text = await fs.readFile(sourcePath);
    if (text === null) {
        throw new InvalidManifestError(manifestPath, `${label} ('${target}'): source file not found: ${sourcePath}`);
    }

    return {
        type: 'file',
        path: target,
        content: { kind: item.templated === true ? 'templated' : 'static', text },
    };
}
