import { createWriteStream, promises as fs } from 'fs';
import { dirname, join, resolve } from 'path';
import { pipeline } from 'stream/promises';
import { FILE_PATTERNS } from '../../constants/index.js';
import { RefAsmError } from '../../types/index.js';
import {
  FileSystemError,
  OperationCancelledError,
  getErrorCode,
  isAbortError,
  throwIfCancelled
} from '../../utils/errors.js';
import { ensureDir, exists, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { PackageDownload } from '../registry/types.js';
import { formatIdentity, type PackageIdentity } from './package-identity.js';

/**
 * Errors from probing a package folder that mean it is simply not there
 */
const NOT_INSTALLED_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);

export interface PackageStore {
  readonly root: string;

  /**
   * Folder of a fully extracted copy of `identity`, or null when there is none
   */
  getInstalledPath(identity: PackageIdentity): Promise<string | null>;

  /**
   * Extract `download` into this store and return the installed folder
   */
  extract(download: PackageDownload, signal?: AbortSignal): Promise<string>;
}

/**
 * Extracted packages laid out as `<root>/<id-lowercase>/<version>/`.
 *
 * A folder only counts as installed once its completion marker exists; the
 * marker is written into a staging folder that is renamed into place last, so
 * readers never observe a partial extraction.
 */
export class PackageFolderStore implements PackageStore {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  getPackageDirectory(identity: PackageIdentity): string {
    return join(this.root, identity.id.toLowerCase(), identity.version.toString().toLowerCase());
  }

  async getInstalledPath(identity: PackageIdentity): Promise<string | null> {
    const packageDir = this.getPackageDirectory(identity);
    try {
      await fs.access(join(packageDir, FILE_PATTERNS.COMPLETION_MARKER));
      return packageDir;
    } catch (error) {
      const code = getErrorCode(error);
      if (code && NOT_INSTALLED_CODES.has(code)) {
        if (code === 'ENAMETOOLONG') {
          logger.debug(`Install path for ${formatIdentity(identity)} is too long; treating as not installed`, { packageDir });
        }
        return null;
      }
      throw new FileSystemError(`Failed to check ${formatIdentity(identity)} in ${this.root}`, { packageDir, error });
    }
  }

  async extract(download: PackageDownload, signal?: AbortSignal): Promise<string> {
    const { identity } = download;
    const packageDir = this.getPackageDirectory(identity);
    const stagingDir = `${packageDir}.${process.pid}.${Date.now().toString(36)}.tmp`;

    throwIfCancelled(signal);
    logger.debug(`Extracting ${formatIdentity(identity)}`, { packageDir });

    try {
      const files = await download.reader.getFiles(signal);
      for (const file of files) {
        throwIfCancelled(signal);
        const target = join(stagingDir, ...file.split('/'));
        await ensureDir(dirname(target));
        await pipeline(download.openEntry(file, signal), createWriteStream(target), { signal });
      }
      await ensureDir(stagingDir);
      await fs.writeFile(join(stagingDir, FILE_PATTERNS.COMPLETION_MARKER), new Date().toISOString(), 'utf8');

      if (await this.getInstalledPath(identity)) {
        // Someone without the shared lock got there first; keep their copy
        await remove(stagingDir);
        return packageDir;
      }

      // A folder without the marker is the remains of an interrupted extraction
      if (await exists(packageDir)) {
        await remove(packageDir);
      }
      await fs.rename(stagingDir, packageDir);
      return packageDir;
    } catch (error) {
      await remove(stagingDir);
      if (isAbortError(error)) {
        throw new OperationCancelledError(`Extraction of ${formatIdentity(identity)} was cancelled`);
      }
      if (error instanceof RefAsmError) {
        throw error;
      }
      throw new FileSystemError(`Failed to extract ${formatIdentity(identity)} into ${packageDir}`, { packageDir, error });
    }
  }
}
