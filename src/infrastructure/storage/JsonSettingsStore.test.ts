import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonSettingsStore } from './JsonSettingsStore.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

describe('JsonSettingsStore', () => {
  let dataDir: string;
  let mockLogger: ILogger;
  let store: JsonSettingsStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'llm-settings-'));

    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    store = new JsonSettingsStore(join(dataDir, 'nested'), mockLogger);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should return empty settings when nothing was saved', async () => {
    expect(await store.load()).toEqual({});
  });

  it('should round-trip saved settings', async () => {
    const settings = { prefix: 'llm', zones: [{ id: 'office', signals: ['binary_sensor.office'], priority: 1 }] };

    await store.save(settings);

    expect(await store.load()).toEqual(settings);
    expect(await readFile(join(dataDir, 'nested', 'ui_config.json'), 'utf-8')).toBe(
      JSON.stringify(settings, null, 2)
    );
  });

  it('should ignore a corrupt file', async () => {
    await store.save({});
    await writeFile(store.filePath, '{ not json', 'utf-8');

    expect(await store.load()).toEqual({});
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Saved settings are not valid JSON, ignoring them',
      expect.objectContaining({ path: store.filePath })
    );
  });

  it('should ignore a file that does not hold an object', async () => {
    await store.save({});
    await writeFile(store.filePath, '[1, 2, 3]', 'utf-8');

    expect(await store.load()).toEqual({});
    expect(mockLogger.warn).toHaveBeenCalledWith('Saved settings are not an object, ignoring them', {
      path: store.filePath,
    });
  });
});
