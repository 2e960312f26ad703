import { z } from 'zod';
import {
  AWAY_MODE,
  HOME_MODE,
  RESERVED_ZONE_IDS,
  modeForZone,
  normalizeModeKey,
  type LocationMode,
} from '../../domain/entities/LocationMode.js';
import { getEntityDomain, isEntityId } from '../../domain/entities/Entity.js';
import type { GeneratorInput } from '../../domain/entities/GeneratorInput.js';
import type { LightReaction } from '../../domain/entities/LightTarget.js';
import type { PresenceSignal, Zone } from '../../domain/entities/Zone.js';
import { ValidationError, type ValidationIssue } from '../../domain/errors/GenerationError.js';

/**
 * Values used when the submitted settings leave them out
 */
export interface GeneratorDefaults {
  prefix: string;
  dwellSeconds: number;
}

// Form fields arrive as empty strings when left blank
const blankToUndefined = (value: unknown): unknown =>
  value === '' || value === null ? undefined : value;

const SlugSchema = z
  .string()
  .trim()
  .regex(/^[a-z][a-z0-9_]*$/, 'must start with a letter and use only a-z, 0-9 and _');

const EntityIdSchema = z
  .string()
  .trim()
  .refine(isEntityId, 'must be an entity id like domain.object_id');

interface SignalFields {
  entityId: string;
  state?: string;
  states?: string[];
  statePrefix?: string;
}

/**
 * `entity=state`, `entity=a|b` for any of several states, `entity=prefix*`
 */
function parseSignalShorthand(value: string): SignalFields {
  const [entityId, ...rest] = value.split('=');
  const state = rest.join('=').trim();
  if (!state) return { entityId };
  if (state.includes('|')) return { entityId, states: state.split('|').map((part) => part.trim()) };
  if (state.endsWith('*')) return { entityId, statePrefix: state.slice(0, -1) };
  return { entityId, state };
}

const StateSchema = z.string().trim().min(1, 'must not be empty');

/**
 * `"binary_sensor.kitchen"`, `"person.alex=home"`, `"device_tracker.phone=condo|beach"`,
 * `"device_tracker.phone=shop_*"`, or the object form. The state defaults to `on`.
 */
export const SignalSchema = z.preprocess(
  (value) => (typeof value === 'string' ? parseSignalShorthand(value) : value),
  z
    .object({
      entityId: EntityIdSchema,
      state: StateSchema.optional(),
      states: z.array(StateSchema).min(1, 'must list at least one state').optional(),
      statePrefix: StateSchema.optional(),
    })
    .refine(
      (signal) =>
        [signal.state, signal.states, signal.statePrefix].filter((match) => match !== undefined)
          .length <= 1,
      'use only one of state, states or statePrefix'
    )
    .transform((signal): PresenceSignal => {
      if (signal.states) return { entityId: signal.entityId, states: signal.states };
      if (signal.statePrefix !== undefined) {
        return { entityId: signal.entityId, statePrefix: signal.statePrefix };
      }
      return { entityId: signal.entityId, state: signal.state ?? 'on' };
    })
);

// Form numbers arrive as strings; blanks become absent instead of 0
const formNumber = (value: unknown): unknown => {
  const present = blankToUndefined(value);
  return typeof present === 'string' && present.trim() !== '' ? Number(present) : present;
};

const ChannelSchema = z.preprocess(
  formNumber,
  z
    .number({
      required_error: 'must be a number from 0 to 255',
      invalid_type_error: 'must be a number from 0 to 255',
    })
    .int('must be a whole number')
    .min(0, 'must be a number from 0 to 255')
    .max(255, 'must be a number from 0 to 255')
);

const RgbSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.split(',').map((part) => part.trim()) : value),
  z.tuple([ChannelSchema, ChannelSchema, ChannelSchema], {
    invalid_type_error: 'must be three channels like "255,120,0"',
  })
);

export const ReactionSchema = z.object({
  rgb: z.preprocess(blankToUndefined, RgbSchema.optional()),
  brightness: z.preprocess(blankToUndefined, ChannelSchema.optional()),
  transition: z.preprocess(blankToUndefined, z.coerce.number().min(0).optional()),
  off: z.boolean().optional(),
});

const ReactionMapSchema = z.record(z.string(), ReactionSchema);

export const ZoneSchema = z.object({
  id: SlugSchema.refine((id) => !RESERVED_ZONE_IDS.includes(id), {
    message: `must not be one of: ${RESERVED_ZONE_IDS.join(', ')}`,
  }),
  name: z.preprocess(blankToUndefined, z.string().trim().optional()),
  signals: z.array(SignalSchema).min(1, 'each zone needs at least one signal'),
  priority: z.preprocess(
    formNumber,
    z
      .number({ required_error: 'priority is required', invalid_type_error: 'must be a whole number' })
      .int('must be a whole number')
  ),
});

const LightTargetSchema = z.preprocess(
  (value) => (typeof value === 'string' ? { entityId: value } : value),
  z.object({
    entityId: EntityIdSchema,
    reactions: ReactionMapSchema.default({}),
  })
);

const FlourishSchema = z.object({
  enabled: z.boolean().default(true),
  durationSeconds: z.coerce.number().int('must be a whole number of seconds').positive('must be greater than 0'),
  flash: z.enum(['short', 'long']).default('short'),
  rgb: z.preprocess(blankToUndefined, RgbSchema.optional()),
  brightness: z.preprocess(blankToUndefined, ChannelSchema.optional()),
  oncePerDay: z.boolean().default(false),
});

export const GeneratorSettingsSchema = z.object({
  prefix: z.preprocess(blankToUndefined, SlugSchema.optional()),
  zones: z.array(ZoneSchema).default([]),
  homeSignal: z.preprocess(blankToUndefined, SignalSchema.optional()),
  entities: z.array(LightTargetSchema).default([]),
  colors: ReactionMapSchema.default({}),
  defaultReaction: z.preprocess(blankToUndefined, ReactionSchema.optional()),
  fallback: z.enum(['keep', 'strict']).default('keep'),
  dwellSeconds: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0, 'dwell time must not be negative').optional()
  ),
  overrideEnabled: z.boolean().default(true),
  pinnedMode: z.preprocess(blankToUndefined, z.string().trim().optional()),
  flourish: z.preprocess(blankToUndefined, FlourishSchema.optional()),
});

export type GeneratorSettings = z.infer<typeof GeneratorSettingsSchema>;

function titleCase(slug: string): string {
  return slug
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Normalizes mode keys and reports the ones that name no configured mode
 * or repeat a mode under another spelling
 */
function resolveReactionMap(
  map: Record<string, LightReaction>,
  modes: readonly LocationMode[],
  field: string,
  issues: ValidationIssue[]
): Partial<Record<LocationMode, LightReaction>> {
  const resolved: Partial<Record<LocationMode, LightReaction>> = {};
  const keysByMode = new Map<LocationMode, string>();
  for (const [key, reaction] of Object.entries(map)) {
    const mode = normalizeModeKey(key);
    if (!modes.includes(mode)) {
      issues.push({ field: `${field}.${key}`, reason: `unknown mode "${key}"` });
      continue;
    }
    const previous = keysByMode.get(mode);
    if (previous !== undefined) {
      issues.push({ field: `${field}.${key}`, reason: `mode ${mode} is already set by "${previous}"` });
      continue;
    }
    keysByMode.set(mode, key);
    resolved[mode] = reaction;
  }
  return resolved;
}

/**
 * Applies the invariants zod cannot express per field and builds the
 * resolved input. Issues are collected in field order.
 */
function resolveSettings(settings: GeneratorSettings, defaults: GeneratorDefaults): GeneratorInput {
  const issues: ValidationIssue[] = [];

  const zoneIds = new Map<string, number>();
  const priorities = new Map<number, string>();
  const zones: Zone[] = settings.zones.map((zone, index) => {
    if (zoneIds.has(zone.id)) {
      issues.push({ field: `zones.${index}.id`, reason: `duplicate zone id "${zone.id}"` });
    }
    zoneIds.set(zone.id, index);

    const owner = priorities.get(zone.priority);
    if (owner !== undefined) {
      issues.push({
        field: `zones.${index}.priority`,
        reason: `priority ${zone.priority} is already used by zone "${owner}"`,
      });
    } else {
      priorities.set(zone.priority, zone.id);
    }

    return {
      id: zone.id,
      name: zone.name ?? titleCase(zone.id),
      mode: modeForZone(zone.id),
      signals: zone.signals,
      priority: zone.priority,
    };
  });

  const modes: LocationMode[] = [
    ...[...zones].sort((a, b) => b.priority - a.priority).map((zone) => zone.mode),
    HOME_MODE,
    AWAY_MODE,
  ];

  const seenLights = new Set<string>();
  const lights = settings.entities.map((light, index) => {
    if (getEntityDomain(light.entityId) !== 'light') {
      issues.push({ field: `entities.${index}.entityId`, reason: `"${light.entityId}" is not a light` });
    }
    if (seenLights.has(light.entityId)) {
      issues.push({ field: `entities.${index}.entityId`, reason: `duplicate light "${light.entityId}"` });
    }
    seenLights.add(light.entityId);
    return {
      entityId: light.entityId,
      reactions: resolveReactionMap(light.reactions, modes, `entities.${index}.reactions`, issues),
    };
  });

  const colors = resolveReactionMap(settings.colors, modes, 'colors', issues);
  const defaultReaction = settings.defaultReaction ?? null;

  if (settings.fallback === 'strict' && defaultReaction === null) {
    lights.forEach((light, index) => {
      for (const mode of modes) {
        if (light.reactions[mode] === undefined && colors[mode] === undefined) {
          issues.push({
            field: `entities.${index}.reactions.${mode}`,
            reason: `no reaction for mode ${mode} and no default available`,
          });
        }
      }
    });
  }

  let pinnedMode: LocationMode | null = null;
  if (settings.pinnedMode !== undefined) {
    const mode = normalizeModeKey(settings.pinnedMode);
    if (modes.includes(mode)) {
      pinnedMode = mode;
    } else {
      issues.push({ field: 'pinnedMode', reason: `unknown mode "${settings.pinnedMode}"` });
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  const flourish = settings.flourish?.enabled
    ? {
        durationSeconds: settings.flourish.durationSeconds,
        flash: settings.flourish.flash,
        rgb: settings.flourish.rgb,
        brightness: settings.flourish.brightness,
        oncePerDay: settings.flourish.oncePerDay,
      }
    : null;

  return {
    prefix: settings.prefix ?? defaults.prefix,
    zones,
    homeSignal: settings.homeSignal ?? null,
    modes,
    lights,
    colors,
    defaultReaction,
    fallback: settings.fallback,
    dwell: { seconds: settings.dwellSeconds ?? defaults.dwellSeconds },
    override: { enabled: settings.overrideEnabled, pinnedMode },
    flourish,
  };
}

/**
 * Validates raw form settings into a resolved GeneratorInput.
 * Throws ValidationError; never returns a partial result.
 */
export function parseGeneratorInput(raw: unknown, defaults: GeneratorDefaults): GeneratorInput {
  const result = GeneratorSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        reason: issue.message,
      }))
    );
  }
  return resolveSettings(result.data, defaults);
}
