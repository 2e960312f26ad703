/**
 * A location mode name as it appears in the generated mode selector,
 * e.g. `KITCHEN`, `HOME`, `AWAY`
 */
export type LocationMode = string;

export const HOME_MODE: LocationMode = 'HOME';
export const AWAY_MODE: LocationMode = 'AWAY';

/**
 * Zone ids whose mode would collide with the implicit modes or the KEEP pin
 */
export const RESERVED_ZONE_IDS: readonly string[] = ['home', 'away', 'keep'];

/**
 * Sentinel option of the pinned-mode selector meaning "leave the mode unchanged"
 */
export const KEEP_MODE = 'KEEP';

/**
 * Derives the mode name of a zone from its id
 */
export function modeForZone(zoneId: string): LocationMode {
  return zoneId.toUpperCase();
}

/**
 * Normalizes a mode key typed into the form (`home`, ` Kitchen `)
 */
export function normalizeModeKey(key: string): LocationMode {
  return key.trim().toUpperCase();
}
