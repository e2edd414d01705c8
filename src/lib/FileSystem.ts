// File: src/lib/FileSystem.ts
import fsPromises from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { Stats } from 'fs';
import path from 'path';
import { IOFailureError } from './errors';

/**
 * Filesystem access used by the scaffolder. Every failure surfaces as an
 * IOFailureError carrying the offending path; the original error is kept as `cause`.
 */
class FileSystem {

    /**
     * Writes `content` to `filePath`, creating parent directories as needed.
     * The file handle is closed on every exit path. When both the write and the
     * close fail, the write error is the one reported.
     */
    async writeFile(filePath: string, content: string): Promise<void> {
        await this.ensureDirExists(path.dirname(filePath));
        let handle: FileHandle | undefined;
        let failed = false;
        let failure: unknown;
        try {
            handle = await fsPromises.open(filePath, 'w');
            await handle.writeFile(content, 'utf-8');
        } catch (error) {
            failed = true;
            failure = error;
        }
        if (handle !== undefined) {
            try {
                await handle.close();
            } catch (error) {
                if (!failed) {
                    failed = true;
                    failure = error;
                }
            }
        }
        if (failed) {
            throw new IOFailureError(filePath, 'write', failure);
        }
    }

    async readFile(filePath: string): Promise<string | null> {
        try {
            return await fsPromises.readFile(filePath, 'utf-8');
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
                return null;
            }
            throw new IOFailureError(filePath, 'read', error);
        }
    }

    /**
     * @returns The Stats object, or null if nothing exists at `filePath`.
     */
    async stat(filePath: string): Promise<Stats | null> {
        try {
            return await fsPromises.stat(filePath);
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
            throw new IOFailureError(filePath, 'stat', error);
        }
    }

    /**
     * Checks whether a directory has no entries at all. A missing directory counts as empty.
     */
    async isDirectoryEmpty(dirPath: string): Promise<boolean> {
        try {
            const entries = await fsPromises.readdir(dirPath);
            return entries.length === 0;
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
                return true;
            }
            throw new IOFailureError(dirPath, 'readdir', error);
        }
    }

    /**
     * Ensures the directory and its ancestors exist. Idempotent.
     */
    async ensureDirExists(dir: string): Promise<void> {
        try {
            await fsPromises.mkdir(dir, { recursive: true });
        } catch (error) {
            throw new IOFailureError(dir, 'mkdir', error);
        }
    }
}

export { FileSystem };
