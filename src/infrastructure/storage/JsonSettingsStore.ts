import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { ISettingsStore, RawSettings } from '../../domain/ports/ISettingsStore.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

const SETTINGS_FILE = 'ui_config.json';

function isRecord(value: unknown): value is RawSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps the last submitted form settings as JSON in the add-on data directory
 */
export class JsonSettingsStore implements ISettingsStore {
  readonly filePath: string;

  constructor(dataDir: string, private readonly logger: ILogger) {
    this.filePath = join(dataDir, SETTINGS_FILE);
  }

  async load(): Promise<RawSettings> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isRecord(parsed)) return parsed;
      this.logger.warn('Saved settings are not an object, ignoring them', { path: this.filePath });
    } catch (error) {
      this.logger.warn('Saved settings are not valid JSON, ignoring them', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  async save(settings: RawSettings): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
    this.logger.debug('Settings saved', { path: this.filePath });
  }
}
