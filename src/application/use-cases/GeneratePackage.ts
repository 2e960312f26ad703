import type { ILogger } from '../../domain/ports/ILogger.js';
import type { IPackagePublisher } from '../../domain/ports/IPackagePublisher.js';
import type { RawSettings } from '../../domain/ports/ISettingsStore.js';
import {
  GenerationError,
  ValidationError,
  type GenerationErrorKind,
} from '../../domain/errors/GenerationError.js';
import {
  parseGeneratorInput,
  type GeneratorDefaults,
} from '../../infrastructure/validation/GeneratorInputSchema.js';
import { AssemblePackage } from './AssemblePackage.js';

export interface GenerationFailure {
  kind: GenerationErrorKind;
  /** Offending field, for validation failures */
  field?: string;
  reason: string;
}

export type PreviewPackageOutput =
  | { success: true; yaml: string }
  | { success: false; error: GenerationFailure };

export type GeneratePackageOutput =
  | { success: true; path: string; bytes: number }
  | { success: false; error: GenerationFailure };

/**
 * Use case for validate → assemble → publish.
 * Failures come back as values; nothing is retried and nothing partial is written.
 */
export class GeneratePackage {
  private readonly assemblePackage: AssemblePackage;

  constructor(
    private readonly publisher: IPackagePublisher,
    private readonly logger: ILogger,
    private readonly defaults: GeneratorDefaults
  ) {
    this.assemblePackage = new AssemblePackage(logger);
  }

  /**
   * Builds the document without writing it
   */
  preview(settings: RawSettings): PreviewPackageOutput {
    try {
      return { success: true, yaml: this.render(settings) };
    } catch (error) {
      return { success: false, error: this.toFailure(error) };
    }
  }

  async execute(settings: RawSettings): Promise<GeneratePackageOutput> {
    this.logger.info('Executing GeneratePackage use case');

    try {
      const yaml = this.render(settings);
      const result = await this.publisher.publish(yaml);
      this.logger.info('Package published', { path: result.path, bytes: result.bytes });
      return { success: true, path: result.path, bytes: result.bytes };
    } catch (error) {
      return { success: false, error: this.toFailure(error) };
    }
  }

  private render(settings: RawSettings): string {
    const input = parseGeneratorInput(settings, this.defaults);
    return this.assemblePackage.execute(input).yaml;
  }

  private toFailure(error: unknown): GenerationFailure {
    if (!(error instanceof GenerationError)) {
      this.logger.error('Unexpected error while generating package', error);
      return {
        kind: 'internal',
        reason: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    switch (error.kind) {
      case 'validation':
        this.logger.warn('Settings rejected', { error: error.message });
        break;
      case 'persistence':
        this.logger.error('Failed to publish package', error);
        break;
      case 'internal':
        this.logger.error('Internal invariant violated while generating package', error);
        break;
    }

    return {
      kind: error.kind,
      ...(error instanceof ValidationError ? { field: error.field } : {}),
      reason: error instanceof ValidationError ? error.reason : error.message,
    };
  }
}
