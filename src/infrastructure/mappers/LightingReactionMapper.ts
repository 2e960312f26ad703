import { HOME_MODE, type LocationMode } from '../../domain/entities/LocationMode.js';
import {
  isEmptyReaction,
  type LightAction,
  type LightReaction,
  type LightTarget,
  type LightingStep,
  type ReactionSource,
  type TurnOffAction,
  type TurnOnAction,
} from '../../domain/entities/LightTarget.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import { InternalInvariantError } from '../../domain/errors/GenerationError.js';

export type LightingInput = Pick<
  GeneratorInput,
  'lights' | 'colors' | 'defaultReaction' | 'fallback' | 'flourish'
>;

export interface ResolvedReaction {
  reaction: LightReaction;
  source: ReactionSource;
}

/**
 * Lighting steps for one mode
 */
export interface ModeLighting {
  mode: LocationMode;
  steps: LightingStep[];
}

const NO_CHANGE: LightReaction = {};

/**
 * Maps location modes to per-light actions
 */
export class LightingReactionMapper {
  /**
   * Finds the reaction for a light in a mode: the light's own reaction, then
   * the shared color for the mode, then the default reaction, then no change.
   */
  static resolveReaction(
    light: LightTarget,
    mode: LocationMode,
    input: LightingInput
  ): ResolvedReaction {
    const own = light.reactions[mode];
    if (own) return { reaction: own, source: 'entity' };

    const shared = input.colors[mode];
    if (shared) return { reaction: shared, source: 'colors' };

    if (input.defaultReaction) return { reaction: input.defaultReaction, source: 'default' };

    if (input.fallback === 'strict') {
      throw new InternalInvariantError(
        `No reaction resolved for ${light.entityId} in mode ${mode} under strict fallback`
      );
    }
    return { reaction: NO_CHANGE, source: 'fallback' };
  }

  /**
   * Converts a resolved reaction into a concrete action
   */
  static toAction(entityId: string, resolved: ResolvedReaction): LightAction {
    const { reaction, source } = resolved;

    if (reaction.off) {
      const action: TurnOffAction = { kind: 'turn_off', entityId, source };
      if (reaction.transition !== undefined) action.transition = reaction.transition;
      return action;
    }

    if (isEmptyReaction(reaction)) {
      return { kind: 'no_change', entityId, source };
    }

    const action: TurnOnAction = { kind: 'turn_on', entityId, source };
    if (reaction.rgb) action.rgb = reaction.rgb;
    if (reaction.brightness !== undefined) action.brightness = reaction.brightness;
    if (reaction.transition !== undefined) action.transition = reaction.transition;
    return action;
  }

  /**
   * Ordered steps applied when `mode` becomes current: one action per light
   * in configuration order. Entering HOME with a flourish configured prefixes
   * the flourish actions and a wait of the flourish duration.
   */
  static mapMode(mode: LocationMode, input: LightingInput): LightingStep[] {
    const steps: LightingStep[] = [];

    if (mode === HOME_MODE && input.flourish && input.lights.length > 0) {
      const { flourish } = input;
      for (const light of input.lights) {
        const action: TurnOnAction = {
          kind: 'turn_on',
          entityId: light.entityId,
          flash: flourish.flash,
          source: 'flourish',
        };
        if (flourish.rgb) action.rgb = flourish.rgb;
        if (flourish.brightness !== undefined) action.brightness = flourish.brightness;
        steps.push({ type: 'action', action });
      }
      steps.push({ type: 'wait', seconds: flourish.durationSeconds });
    }

    for (const light of input.lights) {
      const resolved = this.resolveReaction(light, mode, input);
      steps.push({ type: 'action', action: this.toAction(light.entityId, resolved) });
    }

    return steps;
  }

  /**
   * Steps for every mode, in mode order
   */
  static mapAll(modes: readonly LocationMode[], input: LightingInput): ModeLighting[] {
    return modes.map((mode) => ({ mode, steps: this.mapMode(mode, input) }));
  }

  /**
   * Splits a mode's steps into the flourish prefix (actions and trailing wait)
   * and the steady-state reaction
   */
  static splitFlourish(steps: readonly LightingStep[]): {
    flourish: LightingStep[];
    steady: LightingStep[];
  } {
    const waitIndex = steps.findIndex((step) => step.type === 'wait');
    if (waitIndex === -1) {
      return { flourish: [], steady: [...steps] };
    }
    return { flourish: steps.slice(0, waitIndex + 1), steady: steps.slice(waitIndex + 1) };
  }
}
