import type { ILogger } from "../domain/ports/ILogger.js";
import type { IPackagePublisher } from "../domain/ports/IPackagePublisher.js";
import type { ISettingsStore, RawSettings } from "../domain/ports/ISettingsStore.js";
import {
  GeneratePackage,
  SaveSettings,
  type GeneratePackageOutput,
  type PreviewPackageOutput,
  type SaveSettingsOutput,
} from "../application/index.js";
import type { GeneratorDefaults } from "../infrastructure/validation/GeneratorInputSchema.js";

export interface ConfiguratorConfig {
  defaults: GeneratorDefaults;
}

/**
 * Orchestrates the settings form: load, save, preview and apply
 */
export class Configurator {
  private generatePackageUseCase: GeneratePackage;
  private saveSettingsUseCase: SaveSettings;

  constructor(
    private readonly store: ISettingsStore,
    publisher: IPackagePublisher,
    private readonly logger: ILogger,
    private readonly config: ConfiguratorConfig
  ) {
    this.generatePackageUseCase = new GeneratePackage(publisher, logger, config.defaults);
    this.saveSettingsUseCase = new SaveSettings(store, logger, config.defaults);

    this.logger.info("Configurator initialized", { prefix: config.defaults.prefix });
  }

  /**
   * Saved settings with configured defaults filled in, for pre-filling the form
   */
  async getSettings(): Promise<RawSettings> {
    const saved = await this.store.load();
    return {
      prefix: this.config.defaults.prefix,
      dwellSeconds: this.config.defaults.dwellSeconds,
      ...saved,
    };
  }

  async saveSettings(settings: RawSettings): Promise<SaveSettingsOutput> {
    return this.saveSettingsUseCase.execute(settings);
  }

  /**
   * Renders the package for the given settings, or the saved ones
   */
  async preview(settings?: RawSettings): Promise<PreviewPackageOutput> {
    return this.generatePackageUseCase.preview(settings ?? (await this.store.load()));
  }

  /**
   * Generates the package from the saved settings and writes it
   */
  async apply(): Promise<GeneratePackageOutput> {
    const settings = await this.store.load();
    return this.generatePackageUseCase.execute(settings);
  }
}
