import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ISettingsStore, RawSettings } from '../../domain/ports/ISettingsStore.js';
import { ValidationError } from '../../domain/errors/GenerationError.js';
import {
  parseGeneratorInput,
  type GeneratorDefaults,
} from '../../infrastructure/validation/GeneratorInputSchema.js';

export type SaveSettingsOutput =
  | { success: true }
  | { success: false; error: { kind: 'validation'; field: string; reason: string } };

/**
 * Use case for storing form settings. Settings that would not generate a
 * valid package are rejected and the stored copy is left as it was.
 */
export class SaveSettings {
  constructor(
    private readonly store: ISettingsStore,
    private readonly logger: ILogger,
    private readonly defaults: GeneratorDefaults
  ) {}

  async execute(settings: RawSettings): Promise<SaveSettingsOutput> {
    this.logger.info('Executing SaveSettings use case');

    try {
      parseGeneratorInput(settings, this.defaults);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn('Settings rejected', { field: error.field, reason: error.reason });
        return {
          success: false,
          error: { kind: 'validation', field: error.field, reason: error.reason },
        };
      }
      throw error;
    }

    await this.store.save(settings);
    return { success: true };
  }
}
