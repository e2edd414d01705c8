// src/lib/config_defaults.ts
import path from 'path';

/**
 * Bundled template for a DDD-layered FastAPI service. Resolves the same way from
 * src/lib and from the compiled dist/lib.
 */
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, '..', '..', 'templates', 'fastapi-ddd');

export const MANIFEST_FILE_NAME = 'manifest.yaml';

/** Directory, inside a template, holding the payload files named by `source`. */
export const PAYLOAD_DIR_NAME = 'files';
