import { describe, it, expect } from 'vitest';
import { LightingReactionMapper, type LightingInput } from './LightingReactionMapper.js';
import { InternalInvariantError } from '../../domain/errors/GenerationError.js';

function createInput(overrides: Partial<LightingInput> = {}): LightingInput {
  return {
    lights: [
      { entityId: 'light.hall', reactions: { KITCHEN: { rgb: [0, 255, 0] } } },
      { entityId: 'light.desk', reactions: { AWAY: { off: true, transition: 2 } } },
    ],
    colors: { HOME: { rgb: [255, 200, 120], brightness: 180 } },
    defaultReaction: null,
    fallback: 'keep',
    flourish: null,
    ...overrides,
  };
}

describe('LightingReactionMapper', () => {
  describe('resolveReaction', () => {
    it('should prefer the light reaction over shared colors', () => {
      const input = createInput({ colors: { KITCHEN: { brightness: 10 } } });

      expect(LightingReactionMapper.resolveReaction(input.lights[0], 'KITCHEN', input)).toEqual({
        reaction: { rgb: [0, 255, 0] },
        source: 'entity',
      });
    });

    it('should fall back to the default reaction, then to no change', () => {
      const withDefault = createInput({ defaultReaction: { brightness: 40 } });
      const withoutDefault = createInput();

      expect(
        LightingReactionMapper.resolveReaction(withDefault.lights[0], 'AWAY', withDefault)
      ).toEqual({ reaction: { brightness: 40 }, source: 'default' });
      expect(
        LightingReactionMapper.resolveReaction(withoutDefault.lights[0], 'AWAY', withoutDefault)
      ).toEqual({ reaction: {}, source: 'fallback' });
    });

    it('should throw when nothing resolves under the strict fallback', () => {
      const input = createInput({ fallback: 'strict' });

      expect(() => LightingReactionMapper.resolveReaction(input.lights[0], 'AWAY', input)).toThrow(
        InternalInvariantError
      );
    });
  });

  describe('toAction', () => {
    it('should leave the light alone when the reaction only sets a transition', () => {
      expect(
        LightingReactionMapper.toAction('light.hall', { reaction: { transition: 3 }, source: 'colors' })
      ).toEqual({ kind: 'no_change', entityId: 'light.hall', source: 'colors' });
    });

    it('should keep the transition when the reaction sets a brightness', () => {
      expect(
        LightingReactionMapper.toAction('light.hall', {
          reaction: { brightness: 90, transition: 3 },
          source: 'colors',
        })
      ).toEqual({ kind: 'turn_on', entityId: 'light.hall', brightness: 90, transition: 3, source: 'colors' });
    });
  });

  describe('mapMode', () => {
    it('should emit one action per light in configuration order', () => {
      expect(LightingReactionMapper.mapMode('AWAY', createInput())).toEqual([
        { type: 'action', action: { kind: 'no_change', entityId: 'light.hall', source: 'fallback' } },
        {
          type: 'action',
          action: { kind: 'turn_off', entityId: 'light.desk', transition: 2, source: 'entity' },
        },
      ]);
    });

    it('should emit shared colors for lights without their own reaction', () => {
      expect(LightingReactionMapper.mapMode('HOME', createInput())).toEqual([
        {
          type: 'action',
          action: {
            kind: 'turn_on',
            entityId: 'light.hall',
            rgb: [255, 200, 120],
            brightness: 180,
            source: 'colors',
          },
        },
        {
          type: 'action',
          action: {
            kind: 'turn_on',
            entityId: 'light.desk',
            rgb: [255, 200, 120],
            brightness: 180,
            source: 'colors',
          },
        },
      ]);
    });

    it('should play the flourish, wait, then apply the Home reaction', () => {
      const input = createInput({
        lights: [{ entityId: 'light.hall', reactions: {} }],
        flourish: { durationSeconds: 3, flash: 'long', rgb: [255, 0, 255], oncePerDay: false },
      });

      expect(LightingReactionMapper.mapMode('HOME', input)).toEqual([
        {
          type: 'action',
          action: {
            kind: 'turn_on',
            entityId: 'light.hall',
            flash: 'long',
            rgb: [255, 0, 255],
            source: 'flourish',
          },
        },
        { type: 'wait', seconds: 3 },
        {
          type: 'action',
          action: {
            kind: 'turn_on',
            entityId: 'light.hall',
            rgb: [255, 200, 120],
            brightness: 180,
            source: 'colors',
          },
        },
      ]);
    });

    it('should not add the flourish to other modes', () => {
      const input = createInput({
        flourish: { durationSeconds: 3, flash: 'short', oncePerDay: false },
      });

      expect(LightingReactionMapper.mapMode('KITCHEN', input).map((s) => s.type)).toEqual([
        'action',
        'action',
      ]);
    });
  });

  describe('mapAll', () => {
    it('should resolve an action for every light in every mode', () => {
      const modes = ['KITCHEN', 'HOME', 'AWAY'];
      const result = LightingReactionMapper.mapAll(modes, createInput());

      expect(result.map((entry) => entry.mode)).toEqual(modes);
      for (const entry of result) {
        const entities = entry.steps.flatMap((step) =>
          step.type === 'action' ? [step.action.entityId] : []
        );
        expect(entities).toEqual(['light.hall', 'light.desk']);
      }
    });
  });

  describe('splitFlourish', () => {
    it('should return everything as steady when there is no wait', () => {
      const steps = LightingReactionMapper.mapMode('HOME', createInput());

      expect(LightingReactionMapper.splitFlourish(steps)).toEqual({ flourish: [], steady: steps });
    });

    it('should split at the flourish wait', () => {
      const steps = LightingReactionMapper.mapMode(
        'HOME',
        createInput({ flourish: { durationSeconds: 2, flash: 'short', oncePerDay: true } })
      );
      const { flourish, steady } = LightingReactionMapper.splitFlourish(steps);

      expect(flourish).toHaveLength(3);
      expect(flourish[2]).toEqual({ type: 'wait', seconds: 2 });
      expect(steady).toHaveLength(2);
    });
  });
});
