import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  BuildLightingRuleset,
  renderLightAction,
  renderSteps,
  type LightingRulesetInput,
} from './BuildLightingRuleset.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

function createInput(overrides: Partial<LightingRulesetInput> = {}): LightingRulesetInput {
  return {
    prefix: 'llm',
    modes: ['KITCHEN', 'HOME', 'AWAY'],
    lights: [{ entityId: 'light.hall', reactions: { AWAY: { off: true } } }],
    colors: {
      KITCHEN: { rgb: [0, 120, 255], brightness: 150, transition: 1.5 },
      HOME: { rgb: [255, 180, 90] },
    },
    defaultReaction: null,
    fallback: 'keep',
    flourish: null,
    ...overrides,
  };
}

describe('renderLightAction', () => {
  it('should render turn_on with only the fields that are set', () => {
    expect(
      renderLightAction({ kind: 'turn_on', entityId: 'light.hall', brightness: 20, source: 'colors' })
    ).toEqual({
      service: 'light.turn_on',
      target: { entity_id: 'light.hall' },
      data: { brightness: 20 },
    });
  });

  it('should render turn_off with its transition', () => {
    expect(
      renderLightAction({ kind: 'turn_off', entityId: 'light.hall', transition: 4, source: 'entity' })
    ).toEqual({
      service: 'light.turn_off',
      target: { entity_id: 'light.hall' },
      data: { transition: 4 },
    });
  });

  it('should render no_change to nothing', () => {
    expect(renderLightAction({ kind: 'no_change', entityId: 'light.hall', source: 'fallback' })).toBeNull();
  });
});

describe('renderSteps', () => {
  it('should render waits as delays in order', () => {
    expect(
      renderSteps([
        { type: 'action', action: { kind: 'turn_on', entityId: 'light.a', flash: 'short', source: 'flourish' } },
        { type: 'wait', seconds: 75 },
        { type: 'action', action: { kind: 'no_change', entityId: 'light.a', source: 'fallback' } },
      ])
    ).toEqual([
      { service: 'light.turn_on', target: { entity_id: 'light.a' }, data: { flash: 'short' } },
      { delay: '00:01:15' },
    ]);
  });
});

describe('BuildLightingRuleset', () => {
  let mockLogger: ILogger;
  let useCase: BuildLightingRuleset;

  beforeEach(() => {
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    useCase = new BuildLightingRuleset(mockLogger);
  });

  it('should emit one choose branch per mode', () => {
    const { automations, booleans } = useCase.execute(createInput());

    expect(booleans).toEqual({});
    expect(automations).toEqual([
      {
        id: 'llm_apply_lighting',
        alias: 'Location Lighting Mode [llm] - Apply lighting on mode change',
        description: 'Applies the light reaction of the newly committed location mode.',
        trigger: [{ platform: 'state', entity_id: 'input_select.llm_location_mode', to: null }],
        condition: [],
        action: [
          {
            choose: [
              {
                conditions: [
                  { condition: 'state', entity_id: 'input_select.llm_location_mode', state: 'KITCHEN' },
                ],
                sequence: [
                  {
                    service: 'light.turn_on',
                    target: { entity_id: 'light.hall' },
                    data: { rgb_color: [0, 120, 255], brightness: 150, transition: 1.5 },
                  },
                ],
              },
              {
                conditions: [
                  { condition: 'state', entity_id: 'input_select.llm_location_mode', state: 'HOME' },
                ],
                sequence: [
                  {
                    service: 'light.turn_on',
                    target: { entity_id: 'light.hall' },
                    data: { rgb_color: [255, 180, 90] },
                  },
                ],
              },
              {
                conditions: [
                  { condition: 'state', entity_id: 'input_select.llm_location_mode', state: 'AWAY' },
                ],
                sequence: [{ service: 'light.turn_off', target: { entity_id: 'light.hall' } }],
              },
            ],
          },
        ],
        mode: 'restart',
      },
    ]);
  });

  it('should skip modes that leave every light unchanged', () => {
    const { automations } = useCase.execute(createInput({ colors: {}, lights: [{ entityId: 'light.hall', reactions: {} }] }));

    expect(automations).toEqual([]);
  });

  it('should emit nothing without lights', () => {
    expect(useCase.execute(createInput({ lights: [] }))).toEqual({ booleans: {}, automations: [] });
  });

  it('should play the flourish before the Home reaction', () => {
    const { automations } = useCase.execute(
      createInput({ flourish: { durationSeconds: 3, flash: 'short', oncePerDay: false } })
    );
    const choose = automations[0].action[0];

    if (!('choose' in choose)) throw new Error('expected a choose action');
    expect(choose.choose[1].sequence).toEqual([
      { service: 'light.turn_on', target: { entity_id: 'light.hall' }, data: { flash: 'short' } },
      { delay: '00:00:03' },
      { service: 'light.turn_on', target: { entity_id: 'light.hall' }, data: { rgb_color: [255, 180, 90] } },
    ]);
  });

  it('should gate a once-per-day flourish behind a daily flag', () => {
    const { automations, booleans } = useCase.execute(
      createInput({ flourish: { durationSeconds: 2, flash: 'long', oncePerDay: true } })
    );

    expect(booleans).toEqual({
      llm_flourish_done_today: { name: 'Home Arrival Flourish Done Today', icon: 'mdi:party-popper' },
    });

    const choose = automations[0].action[0];
    if (!('choose' in choose)) throw new Error('expected a choose action');
    expect(choose.choose[1].sequence).toEqual([
      {
        if: [{ condition: 'state', entity_id: 'input_boolean.llm_flourish_done_today', state: 'off' }],
        then: [
          { service: 'light.turn_on', target: { entity_id: 'light.hall' }, data: { flash: 'long' } },
          { service: 'input_boolean.turn_on', target: { entity_id: 'input_boolean.llm_flourish_done_today' } },
          { delay: '00:00:02' },
        ],
      },
      { service: 'light.turn_on', target: { entity_id: 'light.hall' }, data: { rgb_color: [255, 180, 90] } },
    ]);

    expect(automations[1]).toEqual({
      id: 'llm_reset_flourish',
      alias: 'Location Lighting Mode [llm] - Reset arrival flourish daily',
      trigger: [{ platform: 'time', at: '00:00:05' }],
      condition: [],
      action: [{ service: 'input_boolean.turn_off', target: { entity_id: 'input_boolean.llm_flourish_done_today' } }],
      mode: 'single',
    });
  });
});
