import type { ILogger } from '../../domain/ports/ILogger.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import { AWAY_MODE, HOME_MODE, KEEP_MODE } from '../../domain/entities/LocationMode.js';
import { byEvaluationOrder, type PresenceSignal, type Zone } from '../../domain/entities/Zone.js';
import type {
  Action,
  Automation,
  Condition,
  HelperDeclarations,
  ServiceAction,
} from '../../domain/entities/AutomationPackage.js';
import {
  createPackageNames,
  formatDuration,
  jinjaString,
  objectIdOf,
  statesOf,
  type PackageNames,
} from '../../infrastructure/homeassistant/PackageNames.js';

export type ModeRulesetInput = Pick<
  GeneratorInput,
  'prefix' | 'zones' | 'homeSignal' | 'modes' | 'dwell' | 'override'
>;

export interface ModeRuleset {
  helpers: HelperDeclarations;
  automations: Automation[];
}

export function signalTest(signal: PresenceSignal): string {
  if ('states' in signal) {
    return `${statesOf(signal.entityId)} in [${signal.states.map(jinjaString).join(', ')}]`;
  }
  if ('statePrefix' in signal) {
    return `${statesOf(signal.entityId)}.startswith(${jinjaString(signal.statePrefix)})`;
  }
  return `is_state(${jinjaString(signal.entityId)}, ${jinjaString(signal.state)})`;
}

interface TemplateBranch {
  test: string;
  output: string;
}

function ifChain(branches: readonly TemplateBranch[], otherwise: string): string {
  const lines = branches.map(
    (branch, index) => `{% ${index === 0 ? 'if' : 'elif'} ${branch.test} %}${branch.output}`
  );
  lines.push(`{% else %}${otherwise}`, '{% endif %}');
  return lines.join('\n');
}

function zoneTest(zone: Zone): string {
  return zone.signals.map(signalTest).join(' and ');
}

/**
 * Jinja template computing the candidate mode: zones by descending priority,
 * then the home signal, then AWAY
 */
export function buildCandidateTemplate(input: Pick<ModeRulesetInput, 'zones' | 'homeSignal'>): string {
  const branches: TemplateBranch[] = byEvaluationOrder(input.zones).map((zone) => ({
    test: zoneTest(zone),
    output: zone.mode,
  }));
  if (input.homeSignal) {
    branches.push({ test: signalTest(input.homeSignal), output: HOME_MODE });
  }

  return branches.length === 0 ? AWAY_MODE : ifChain(branches, AWAY_MODE);
}

/**
 * Jinja template naming the matching zone, empty when no zone matches.
 * Names are emitted as string literals so they are never read as Jinja.
 */
export function buildZoneNameTemplate(zones: readonly Zone[]): string {
  const branches = byEvaluationOrder(zones).map((zone) => ({
    test: zoneTest(zone),
    output: `{{ ${jinjaString(zone.name)} }}`,
  }));
  return ifChain(branches, '');
}

/**
 * Declares the mode helpers and the automations that compute, debounce and
 * commit the location mode, plus the manual override when enabled
 */
export class BuildModeRuleset {
  constructor(private readonly logger: ILogger) {}

  execute(input: ModeRulesetInput): ModeRuleset {
    const names = createPackageNames(input.prefix);

    this.logger.debug('Building mode ruleset', {
      prefix: input.prefix,
      modes: input.modes,
      dwellSeconds: input.dwell.seconds,
      overrideEnabled: input.override.enabled,
    });

    const automations = [
      this.buildEvaluateAutomation(input, names),
      this.buildCommitAutomation(input, names),
    ];
    if (input.override.enabled) {
      automations.push(this.buildOverrideAutomation(names));
    }

    return { helpers: this.buildHelpers(input, names), automations };
  }

  private buildHelpers(input: ModeRulesetInput, names: PackageNames): HelperDeclarations {
    const helpers: HelperDeclarations = {
      input_select: {
        [objectIdOf(names.modeSelect)]: {
          name: 'Location Mode',
          options: [...input.modes],
          icon: 'mdi:map-marker-radius',
        },
      },
      input_boolean: {},
      timer: {
        [objectIdOf(names.dwellTimer)]: {
          name: 'Location Mode Dwell',
          duration: formatDuration(input.dwell.seconds),
        },
      },
      template: [
        {
          sensor: [
            {
              name: names.candidateSensorName,
              unique_id: objectIdOf(names.candidateSensor),
              state: buildCandidateTemplate(input),
              icon: 'mdi:map-marker-question',
              ...(input.zones.length > 0
                ? { attributes: { zone: buildZoneNameTemplate(input.zones) } }
                : {}),
            },
          ],
        },
      ],
    };

    if (input.override.enabled) {
      helpers.input_boolean[objectIdOf(names.overrideToggle)] = {
        name: 'Location Mode Override',
        icon: 'mdi:hand-back-right',
      };
      helpers.input_select[objectIdOf(names.overrideModeSelect)] = {
        name: 'Location Mode Override Pin',
        options: [KEEP_MODE, ...input.modes],
        initial: input.override.pinnedMode ?? KEEP_MODE,
        icon: 'mdi:pin',
      };
    }

    return helpers;
  }

  private overrideOff(input: ModeRulesetInput, names: PackageNames): Condition[] {
    return input.override.enabled
      ? [{ condition: 'state', entity_id: names.overrideToggle, state: 'off' }]
      : [];
  }

  private candidateIsKnownMode(names: PackageNames): Condition {
    return {
      condition: 'template',
      value_template: `{{ ${statesOf(names.candidateSensor)} in state_attr(${jinjaString(names.modeSelect)}, 'options') }}`,
    };
  }

  private commitCandidate(names: PackageNames): ServiceAction {
    return {
      service: 'input_select.select_option',
      target: { entity_id: names.modeSelect },
      data: { option: `{{ ${statesOf(names.candidateSensor)} }}` },
    };
  }

  private cancelDwell(names: PackageNames): ServiceAction {
    return { service: 'timer.cancel', target: { entity_id: names.dwellTimer } };
  }

  /**
   * Candidate changed (or override released): equal to the current mode
   * cancels any pending dwell; otherwise the dwell restarts for the new
   * candidate, or the candidate commits at once when dwell is 0
   */
  private buildEvaluateAutomation(input: ModeRulesetInput, names: PackageNames): Automation {
    const onDifferentCandidate: Action[] =
      input.dwell.seconds === 0
        ? [this.commitCandidate(names)]
        : [
            this.cancelDwell(names),
            {
              service: 'timer.start',
              target: { entity_id: names.dwellTimer },
              data: { duration: formatDuration(input.dwell.seconds) },
            },
          ];

    return {
      id: names.automationId('evaluate_candidate'),
      alias: names.automationAlias('Evaluate candidate mode'),
      description: 'Starts the dwell timer when the candidate mode differs from the current mode.',
      trigger: [
        { platform: 'state', entity_id: names.candidateSensor, to: null },
        ...(input.override.enabled
          ? [{ platform: 'state' as const, entity_id: names.overrideToggle, to: 'off' }]
          : []),
      ],
      condition: [...this.overrideOff(input, names), this.candidateIsKnownMode(names)],
      action: [
        {
          choose: [
            {
              conditions: [
                {
                  condition: 'template',
                  value_template: `{{ ${statesOf(names.candidateSensor)} == ${statesOf(names.modeSelect)} }}`,
                },
              ],
              sequence: [this.cancelDwell(names)],
            },
          ],
          default: onDifferentCandidate,
        },
      ],
      mode: 'restart',
    };
  }

  private buildCommitAutomation(input: ModeRulesetInput, names: PackageNames): Automation {
    return {
      id: names.automationId('commit_mode'),
      alias: names.automationAlias('Commit mode after dwell'),
      description: 'Commits the candidate once it has been stable for the full dwell time.',
      trigger: [
        {
          platform: 'event',
          event_type: 'timer.finished',
          event_data: { entity_id: names.dwellTimer },
        },
      ],
      condition: [
        ...this.overrideOff(input, names),
        this.candidateIsKnownMode(names),
        {
          condition: 'template',
          value_template: `{{ ${statesOf(names.candidateSensor)} != ${statesOf(names.modeSelect)} }}`,
        },
      ],
      action: [this.commitCandidate(names)],
      mode: 'single',
    };
  }

  private buildOverrideAutomation(names: PackageNames): Automation {
    const pinned = statesOf(names.overrideModeSelect);

    return {
      id: names.automationId('apply_override'),
      alias: names.automationAlias('Apply manual override'),
      description: 'Suspends automatic mode changes and forces the pinned mode while the override is on.',
      trigger: [
        { platform: 'state', entity_id: names.overrideToggle, to: 'on' },
        { platform: 'state', entity_id: names.overrideModeSelect, to: null },
      ],
      condition: [{ condition: 'state', entity_id: names.overrideToggle, state: 'on' }],
      action: [
        this.cancelDwell(names),
        {
          if: [
            {
              condition: 'template',
              value_template: `{{ ${pinned} != ${jinjaString(KEEP_MODE)} }}`,
            },
          ],
          then: [
            {
              service: 'input_select.select_option',
              target: { entity_id: names.modeSelect },
              data: { option: `{{ ${pinned} }}` },
            },
          ],
        },
      ],
      mode: 'restart',
    };
  }
}
