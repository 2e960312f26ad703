import { randomBytes } from 'crypto';
import { mkdir, open, readFile, rename, rm } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import type { IPackagePublisher, PublishResult } from '../../domain/ports/IPackagePublisher.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { PersistenceError } from '../../domain/errors/GenerationError.js';

export interface FilePackagePublisherConfig {
  /** Home Assistant configuration directory */
  configDir: string;
  /** Destination relative to configDir */
  packagePath: string;
  /** Refuse to write unless configuration.yaml enables packages (default true) */
  requirePackagesEnabled?: boolean;
}

const PACKAGES_ENABLED = /^\s*packages\s*:/m;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Writes the package into the Home Assistant config directory.
 * The document goes to a sibling temp file that is fsynced and renamed over
 * the destination, so readers see either the old or the new document.
 */
export class FilePackagePublisher implements IPackagePublisher {
  private readonly config: Required<FilePackagePublisherConfig>;

  constructor(config: FilePackagePublisherConfig, private readonly logger: ILogger) {
    this.config = { requirePackagesEnabled: true, ...config };
  }

  get destination(): string {
    return resolve(this.config.configDir, this.config.packagePath);
  }

  async publish(document: string): Promise<PublishResult> {
    const destination = this.destination;

    if (this.config.requirePackagesEnabled) {
      await this.ensurePackagesEnabled();
    }

    const directory = dirname(destination);
    const tempPath = join(directory, `.${basename(destination)}.${randomBytes(6).toString('hex')}.tmp`);

    try {
      await mkdir(directory, { recursive: true });

      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(document, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await rename(tempPath, destination);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw new PersistenceError(`Could not write ${destination}: ${errorMessage(error)}`, destination, {
        cause: error,
      });
    }

    this.logger.debug('Package written', { path: destination });
    return { path: destination, bytes: Buffer.byteLength(document, 'utf-8') };
  }

  /**
   * Removes a leftover temp file; failures are logged, not thrown
   */
  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      this.logger.warn('Could not remove temp file', { path: tempPath, error: errorMessage(error) });
    }
  }

    private async ensurePackagesEnabled(): Promise<void> {
    const configurationPath = join(this.config.configDir, 'configuration.yaml');

    let configuration: string;
    try {
      configuration = await readFile(configurationPath, 'utf-8');
    } catch (error) {
      const message = isMissingFile(error)
        ? `configuration.yaml not found in ${this.config.configDir}`
        : `Could not read ${configurationPath}: ${errorMessage(error)}`;
      throw new PersistenceError(message, configurationPath, { cause: error });
    }

    if (!PACKAGES_ENABLED.test(configuration)) {
      throw new PersistenceError(
        'Home Assistant packages are not enabled in configuration.yaml',
        configurationPath
      );
    }
  }
}
