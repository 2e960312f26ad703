import type { ILogger } from '../../domain/ports/ILogger.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import type { AutomationPackage } from '../../domain/entities/AutomationPackage.js';
import { InternalInvariantError } from '../../domain/errors/GenerationError.js';
import { BuildModeRuleset } from './BuildModeRuleset.js';
import { BuildLightingRuleset } from './BuildLightingRuleset.js';
import { createPackageNames, objectIdOf } from '../../infrastructure/homeassistant/PackageNames.js';
import { serializePackage } from '../../infrastructure/serialization/PackageYamlSerializer.js';

export interface AssemblePackageOutput {
  document: AutomationPackage;
  yaml: string;
}

/**
 * Use case for composing helpers and both rulesets into one package document.
 * Output depends only on the input, so identical input gives identical text.
 */
export class AssemblePackage {
  private readonly buildModeRuleset: BuildModeRuleset;
  private readonly buildLightingRuleset: BuildLightingRuleset;

  constructor(private readonly logger: ILogger) {
    this.buildModeRuleset = new BuildModeRuleset(logger);
    this.buildLightingRuleset = new BuildLightingRuleset(logger);
  }

  execute(input: GeneratorInput): AssemblePackageOutput {
    this.logger.info('Executing AssemblePackage use case', {
      prefix: input.prefix,
      zones: input.zones.length,
      lights: input.lights.length,
    });

    const modeRuleset = this.buildModeRuleset.execute(input);
    const lightingRuleset = this.buildLightingRuleset.execute(input);

    const document: AutomationPackage = {
      input_select: modeRuleset.helpers.input_select,
      input_boolean: { ...modeRuleset.helpers.input_boolean, ...lightingRuleset.booleans },
      timer: modeRuleset.helpers.timer,
      template: modeRuleset.helpers.template,
      automation: [...modeRuleset.automations, ...lightingRuleset.automations],
    };

    this.assertConsistent(document, input);

    const yaml = serializePackage(document);
    this.logger.debug('Package assembled', {
      automations: document.automation.length,
      bytes: Buffer.byteLength(yaml, 'utf8'),
    });

    return { document, yaml };
  }

  /**
   * Every automation id must be unique and every mode must be selectable
   */
  private assertConsistent(document: AutomationPackage, input: GeneratorInput): void {
    const ids = new Set<string>();
    for (const automation of document.automation) {
      if (ids.has(automation.id)) {
        throw new InternalInvariantError(`Duplicate automation id ${automation.id}`);
      }
      ids.add(automation.id);
    }

    const modeSelect = document.input_select[objectIdOf(createPackageNames(input.prefix).modeSelect)];
    if (!modeSelect) {
      throw new InternalInvariantError('Mode selector missing from package');
    }
    const missing = input.modes.filter((mode) => !modeSelect.options.includes(mode));
    if (missing.length > 0) {
      throw new InternalInvariantError(`Modes missing from selector: ${missing.join(', ')}`);
    }
  }
}
