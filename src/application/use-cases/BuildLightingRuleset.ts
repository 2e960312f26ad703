import type { ILogger } from '../../domain/ports/ILogger.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import { HOME_MODE } from '../../domain/entities/LocationMode.js';
import type { LightAction, LightingStep } from '../../domain/entities/LightTarget.js';
import type {
  Action,
  Automation,
  ChooseOption,
  InputBooleanHelper,
  ServiceAction,
  ServiceData,
} from '../../domain/entities/AutomationPackage.js';
import { LightingReactionMapper } from '../../infrastructure/mappers/LightingReactionMapper.js';
import {
  createPackageNames,
  formatDuration,
  objectIdOf,
  type PackageNames,
} from '../../infrastructure/homeassistant/PackageNames.js';

export type LightingRulesetInput = Pick<
  GeneratorInput,
  'prefix' | 'modes' | 'lights' | 'colors' | 'defaultReaction' | 'fallback' | 'flourish'
>;

export interface LightingRuleset {
  /** input_boolean helpers, keyed by object id */
  booleans: Record<string, InputBooleanHelper>;
  automations: Automation[];
}

/**
 * Renders one light action as a service call; no-change actions render to nothing
 */
export function renderLightAction(action: LightAction): ServiceAction | null {
  switch (action.kind) {
    case 'no_change':
      return null;
    case 'turn_off': {
      const call: ServiceAction = { service: 'light.turn_off', target: { entity_id: action.entityId } };
      if (action.transition !== undefined) call.data = { transition: action.transition };
      return call;
    }
    case 'turn_on': {
      const data: ServiceData = {};
      if (action.rgb) data.rgb_color = [...action.rgb];
      if (action.brightness !== undefined) data.brightness = action.brightness;
      if (action.transition !== undefined) data.transition = action.transition;
      if (action.flash) data.flash = action.flash;
      const call: ServiceAction = { service: 'light.turn_on', target: { entity_id: action.entityId } };
      if (Object.keys(data).length > 0) call.data = data;
      return call;
    }
  }
}

/**
 * Renders ordered lighting steps; waits become delays
 */
export function renderSteps(steps: readonly LightingStep[]): Action[] {
  const actions: Action[] = [];
  for (const step of steps) {
    if (step.type === 'wait') {
      actions.push({ delay: formatDuration(step.seconds) });
      continue;
    }
    const call = renderLightAction(step.action);
    if (call) actions.push(call);
  }
  return actions;
}

/**
 * Builds the automation applying each mode's light reactions when the
 * committed mode changes, and the daily reset of a once-per-day flourish
 */
export class BuildLightingRuleset {
  constructor(private readonly logger: ILogger) {}

  execute(input: LightingRulesetInput): LightingRuleset {
    const names = createPackageNames(input.prefix);
    const booleans: Record<string, InputBooleanHelper> = {};
    const automations: Automation[] = [];

    if (input.lights.length === 0) {
      this.logger.debug('No lights configured, skipping lighting ruleset');
      return { booleans, automations };
    }

    const oncePerDay = input.flourish?.oncePerDay === true;
    const options: ChooseOption[] = [];

    for (const { mode, steps } of LightingReactionMapper.mapAll(input.modes, input)) {
      const sequence =
        mode === HOME_MODE ? this.renderHomeSequence(steps, oncePerDay, names) : renderSteps(steps);

      if (sequence.length === 0) {
        this.logger.debug('Mode leaves every light unchanged', { mode });
        continue;
      }
      options.push({
        conditions: [{ condition: 'state', entity_id: names.modeSelect, state: mode }],
        sequence,
      });
    }

    if (options.length > 0) {
      automations.push({
        id: names.automationId('apply_lighting'),
        alias: names.automationAlias('Apply lighting on mode change'),
        description: 'Applies the light reaction of the newly committed location mode.',
        trigger: [{ platform: 'state', entity_id: names.modeSelect, to: null }],
        condition: [],
        action: [{ choose: options }],
        mode: 'restart',
      });
    }

    if (oncePerDay) {
      booleans[objectIdOf(names.flourishDoneToday)] = {
        name: 'Home Arrival Flourish Done Today',
        icon: 'mdi:party-popper',
      };
      automations.push({
        id: names.automationId('reset_flourish'),
        alias: names.automationAlias('Reset arrival flourish daily'),
        trigger: [{ platform: 'time', at: '00:00:05' }],
        condition: [],
        action: [
          { service: 'input_boolean.turn_off', target: { entity_id: names.flourishDoneToday } },
        ],
        mode: 'single',
      });
    }

    return { booleans, automations };
  }

  /**
   * Home steps with the flourish gated behind the daily flag when it plays once per day
   */
  private renderHomeSequence(
    steps: readonly LightingStep[],
    oncePerDay: boolean,
    names: PackageNames
  ): Action[] {
    const { flourish, steady } = LightingReactionMapper.splitFlourish(steps);
    if (flourish.length === 0 || !oncePerDay) {
      return renderSteps(steps);
    }

    return [
      {
        if: [{ condition: 'state', entity_id: names.flourishDoneToday, state: 'off' }],
        then: [
          ...renderSteps(flourish.filter((step) => step.type === 'action')),
          { service: 'input_boolean.turn_on', target: { entity_id: names.flourishDoneToday } },
          ...renderSteps(flourish.filter((step) => step.type === 'wait')),
        ],
      },
      ...renderSteps(steady),
    ];
  }
}
