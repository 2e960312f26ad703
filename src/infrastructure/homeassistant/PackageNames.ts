import { buildEntityId } from '../../domain/entities/Entity.js';

/**
 * Entity and automation ids of one generated package.
 * Everything is derived from the prefix so regenerating with the same prefix
 * replaces the same entities instead of adding new ones.
 */
export interface PackageNames {
  prefix: string;
  modeSelect: string;
  overrideToggle: string;
  overrideModeSelect: string;
  dwellTimer: string;
  candidateSensor: string;
  flourishDoneToday: string;
  /** Friendly name of the candidate template sensor; Home Assistant derives its entity_id from it */
  candidateSensorName: string;
  automationId(name: string): string;
  automationAlias(title: string): string;
}

export function createPackageNames(prefix: string): PackageNames {
  const objectId = (name: string): string => `${prefix}_${name}`;

  return {
    prefix,
    modeSelect: buildEntityId('input_select', objectId('location_mode')),
    overrideToggle: buildEntityId('input_boolean', objectId('override')),
    overrideModeSelect: buildEntityId('input_select', objectId('override_mode')),
    dwellTimer: buildEntityId('timer', objectId('mode_dwell')),
    candidateSensor: buildEntityId('sensor', objectId('candidate_mode')),
    flourishDoneToday: buildEntityId('input_boolean', objectId('flourish_done_today')),
    candidateSensorName: `${prefix} candidate mode`,
    automationId: objectId,
    automationAlias: (title) => `Location Lighting Mode [${prefix}] - ${title}`,
  };
}

/**
 * Object id part of an entity_id (`input_select.llm_location_mode` → `llm_location_mode`)
 */
export function objectIdOf(entityId: string): string {
  return entityId.slice(entityId.indexOf('.') + 1);
}

/**
 * Formats seconds as the HH:MM:SS string timers and delays accept
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

/**
 * Quotes a value as a Jinja string literal
 */
export function jinjaString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * `states('entity')` expression
 */
export function statesOf(entityId: string): string {
  return `states(${jinjaString(entityId)})`;
}
