import type { LocationMode } from './LocationMode.js';

/**
 * A presence/location signal on one entity. It is true while the entity
 * reports `state`, any of `states`, or a state starting with `statePrefix`.
 */
export type PresenceSignal =
  | { entityId: string; state: string }
  | { entityId: string; states: string[] }
  | { entityId: string; statePrefix: string };

/**
 * A named area whose occupancy is derived from its signals.
 * Higher `priority` wins when several zones match at once.
 */
export interface Zone {
  id: string;
  name: string;
  mode: LocationMode;
  signals: PresenceSignal[];
  priority: number;
}

/**
 * Snapshot of entity states keyed by entity_id, as seen by the engine
 */
export type SignalSnapshot = Readonly<Record<string, string>>;

/**
 * True when the entity named by the signal currently reports a matching state
 */
export function isSignalActive(signal: PresenceSignal, snapshot: SignalSnapshot): boolean {
  const current = snapshot[signal.entityId];
  if (current === undefined) return false;
  if ('states' in signal) return signal.states.includes(current);
  if ('statePrefix' in signal) return current.startsWith(signal.statePrefix);
  return current === signal.state;
}

/**
 * Zones sorted in evaluation order (highest priority first)
 */
export function byEvaluationOrder(zones: readonly Zone[]): Zone[] {
  return [...zones].sort((a, b) => b.priority - a.priority);
}
