export { BuildModeRuleset, buildCandidateTemplate } from './use-cases/BuildModeRuleset.js';
export type { ModeRuleset, ModeRulesetInput } from './use-cases/BuildModeRuleset.js';
export { BuildLightingRuleset, renderLightAction, renderSteps } from './use-cases/BuildLightingRuleset.js';
export type { LightingRuleset, LightingRulesetInput } from './use-cases/BuildLightingRuleset.js';
export { AssemblePackage } from './use-cases/AssemblePackage.js';
export type { AssemblePackageOutput } from './use-cases/AssemblePackage.js';
export { GeneratePackage } from './use-cases/GeneratePackage.js';
export type {
  GeneratePackageOutput,
  GenerationFailure,
  PreviewPackageOutput,
} from './use-cases/GeneratePackage.js';
export { SaveSettings } from './use-cases/SaveSettings.js';
export type { SaveSettingsOutput } from './use-cases/SaveSettings.js';
