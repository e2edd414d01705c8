import { InvalidNameError } from './errors';

/**
 * Throws InvalidNameError unless `name` can be used as a single directory name
 * directly below the destination root.
 */
export function validateProjectName(name: string): void {
    if (name.length === 0) {
        throw new InvalidNameError(name, 'name must not be empty');
    }
    if (name.includes('/') || name.includes('\\')) {
        throw new InvalidNameError(name, 'name must not contain path separators');
    }
    if (name === '.' || name === '..') {
        throw new InvalidNameError(name, 'name must not refer to the current or parent directory');
    }
    if (name.includes('\0')) {
        throw new InvalidNameError(name, 'name must not contain NUL characters');
    }
}

/**
 * Splits a '/'-separated relative path into its segments, or returns null when the
 * path is absolute, uses backslashes, or has empty, '.' or '..' segments.
 */
export function splitRelativePath(relPath: string): string[] | null {
    if (relPath.length === 0 || relPath.startsWith('/') || relPath.includes('\\') || relPath.includes('\0')) {
        return null;
    }
    const segments = relPath.split('/');
    if (segments.some(s => s === '' || s === '.' || s === '..')) {
        return null;
    }
    return segments;
}
