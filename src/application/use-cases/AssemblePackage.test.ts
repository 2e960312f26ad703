import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parse } from 'yaml';
import { AssemblePackage } from './AssemblePackage.js';
import { buildCandidateTemplate } from './BuildModeRuleset.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import { parseGeneratorInput } from '../../infrastructure/validation/GeneratorInputSchema.js';
import { PACKAGE_HEADER } from '../../infrastructure/serialization/PackageYamlSerializer.js';

const settings = {
  zones: [
    { id: 'kitchen', signals: ['binary_sensor.presence_kitchen'], priority: 1 },
    { id: 'garden', signals: ['binary_sensor.presence_garden=on', 'sun.sun=above_horizon'], priority: 2 },
  ],
  homeSignal: 'person.alex=home',
  entities: ['light.hall', 'light.desk'],
  colors: {
    kitchen: { rgb: '0,255,0', brightness: '200' },
    garden: { rgb: '255,255,0' },
    home: { rgb: '255,180,90', brightness: 180 },
    away: { off: true },
  },
  dwellSeconds: 30,
  flourish: { durationSeconds: 3, flash: 'short' },
};

function topLevelKeys(yaml: string): string[] {
  return yaml
    .split('\n')
    .filter((line) => /^[a-z_]+:/.test(line))
    .map((line) => line.slice(0, line.indexOf(':')));
}

describe('AssemblePackage', () => {
  let mockLogger: ILogger;
  let useCase: AssemblePackage;
  let input: GeneratorInput;

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
    useCase = new AssemblePackage(mockLogger);
    input = parseGeneratorInput(settings, { prefix: 'llm', dwellSeconds: 300 });
  });

  it('should produce byte-identical output for identical input', () => {
    const first = useCase.execute(input).yaml;
    const second = useCase.execute(parseGeneratorInput(settings, { prefix: 'llm', dwellSeconds: 300 })).yaml;

    expect(second).toBe(first);
  });

  it('should start with the generated-file header', () => {
    const { yaml } = useCase.execute(input);

    expect(yaml.startsWith(`${PACKAGE_HEADER}\ninput_select:\n`)).toBe(true);
  });

  it('should write sections in a fixed order', () => {
    expect(topLevelKeys(useCase.execute(input).yaml)).toEqual([
      'input_select',
      'input_boolean',
      'timer',
      'template',
      'automation',
    ]);
  });

  it('should keep on/off and times as strings for Home Assistant', () => {
    const parsed: unknown = parse(useCase.execute(input).yaml, { version: '1.1' });

    expect(parsed).toMatchObject({
      automation: [
        {
          id: 'llm_evaluate_candidate',
          trigger: [
            { platform: 'state', entity_id: 'sensor.llm_candidate_mode', to: null },
            { platform: 'state', entity_id: 'input_boolean.llm_override', to: 'off' },
          ],
        },
        { id: 'llm_commit_mode' },
        { id: 'llm_apply_override' },
        { id: 'llm_apply_lighting' },
      ],
      timer: { llm_mode_dwell: { duration: '00:00:30' } },
    });
  });

  it('should embed the candidate template unchanged', () => {
    const parsed: unknown = parse(useCase.execute(input).yaml, { version: '1.1' });

    expect(parsed).toMatchObject({
      template: [{ sensor: [{ unique_id: 'llm_candidate_mode', state: buildCandidateTemplate(input) }] }],
    });
  });

  it('should list every mode in the selector', () => {
    const { document } = useCase.execute(input);

    expect(document.input_select.llm_location_mode?.options).toEqual([
      'GARDEN',
      'KITCHEN',
      'HOME',
      'AWAY',
    ]);
  });

  it('should play the flourish on entering Home, then the Home reaction 3 seconds later', () => {
    const { document } = useCase.execute(input);
    const lighting = document.automation.find((a) => a.id === 'llm_apply_lighting');
    const choose = lighting?.action[0];
    if (!choose || !('choose' in choose)) throw new Error('expected a choose action');

    const home = choose.choose.find((option) =>
      option.conditions.some((c) => c.condition === 'state' && c.state === 'HOME')
    );

    expect(home?.sequence).toEqual([
      { service: 'light.turn_on', target: { entity_id: 'light.hall' }, data: { flash: 'short' } },
      { service: 'light.turn_on', target: { entity_id: 'light.desk' }, data: { flash: 'short' } },
      { delay: '00:00:03' },
      {
        service: 'light.turn_on',
        target: { entity_id: 'light.hall' },
        data: { rgb_color: [255, 180, 90], brightness: 180 },
      },
      {
        service: 'light.turn_on',
        target: { entity_id: 'light.desk' },
        data: { rgb_color: [255, 180, 90], brightness: 180 },
      },
    ]);
  });

  it('should omit empty helper sections', () => {
    const bare = parseGeneratorInput({ overrideEnabled: false }, { prefix: 'llm', dwellSeconds: 0 });
    expect(topLevelKeys(useCase.execute(bare).yaml)).toEqual(['input_select', 'timer', 'template', 'automation']);
  });
});
