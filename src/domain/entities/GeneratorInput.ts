import type { LocationMode } from './LocationMode.js';
import type { PresenceSignal, Zone } from './Zone.js';
import type { ArrivalFlourish, LightReaction, LightTarget } from './LightTarget.js';

/**
 * How an entity without any configured reaction for a mode is handled
 */
export type FallbackPolicy = 'keep' | 'strict';

export interface DwellPolicy {
  /** 0 disables debouncing */
  seconds: number;
}

export interface OverridePolicy {
  enabled: boolean;
  /** null leaves the current mode unchanged while the override is active */
  pinnedMode: LocationMode | null;
}

/**
 * Validated, fully resolved input for one generation
 */
export interface GeneratorInput {
  prefix: string;
  zones: Zone[];
  homeSignal: PresenceSignal | null;
  /** Every mode in selector order: zones by priority, then HOME, then AWAY */
  modes: LocationMode[];
  lights: LightTarget[];
  colors: Partial<Record<LocationMode, LightReaction>>;
  defaultReaction: LightReaction | null;
  fallback: FallbackPolicy;
  dwell: DwellPolicy;
  override: OverridePolicy;
  flourish: ArrivalFlourish | null;
}
