import { AWAY_MODE, HOME_MODE, type LocationMode } from '../entities/LocationMode.js';
import {
  byEvaluationOrder,
  isSignalActive,
  type PresenceSignal,
  type SignalSnapshot,
  type Zone,
} from '../entities/Zone.js';

/**
 * Manual override as seen by the mode machine
 */
export interface OverrideState {
  active: boolean;
  pinnedMode: LocationMode | null;
}

/**
 * Machine state. `pendingSince` is the timestamp (ms) at which the current
 * candidate started its dwell, or null when no commit is pending.
 */
export interface ModeMachineState {
  current: LocationMode;
  candidate: LocationMode;
  pendingSince: number | null;
  override: OverrideState;
}

export type ModeMachineEvent =
  | { type: 'signals'; snapshot: SignalSnapshot; at: number }
  | { type: 'tick'; at: number }
  | { type: 'override'; override: OverrideState; at: number };

export interface ModeMachineConfig {
  zones: readonly Zone[];
  homeSignal: PresenceSignal | null;
  dwellSeconds: number;
}

const INACTIVE_OVERRIDE: OverrideState = { active: false, pinnedMode: null };

/**
 * Computes the candidate mode for a snapshot: the highest-priority zone whose
 * signals are all active, else HOME when the home signal is active, else AWAY.
 */
export function computeCandidate(
  zones: readonly Zone[],
  homeSignal: PresenceSignal | null,
  snapshot: SignalSnapshot
): LocationMode {
  for (const zone of byEvaluationOrder(zones)) {
    if (zone.signals.every((signal) => isSignalActive(signal, snapshot))) {
      return zone.mode;
    }
  }
  if (homeSignal && isSignalActive(homeSignal, snapshot)) {
    return HOME_MODE;
  }
  return AWAY_MODE;
}

/**
 * Reference model of the location mode logic emitted into the package:
 * candidate computation, dwell debouncing and override precedence.
 *
 * `transition` is pure; callers own the state and the clock.
 */
export class ModeStateMachine {
  private readonly dwellMs: number;

  constructor(private readonly config: ModeMachineConfig) {
    this.dwellMs = config.dwellSeconds * 1000;
  }

  initialState(current: LocationMode = AWAY_MODE): ModeMachineState {
    return {
      current,
      candidate: current,
      pendingSince: null,
      override: INACTIVE_OVERRIDE,
    };
  }

  candidateFor(snapshot: SignalSnapshot): LocationMode {
    return computeCandidate(this.config.zones, this.config.homeSignal, snapshot);
  }

  transition(state: ModeMachineState, event: ModeMachineEvent): ModeMachineState {
    switch (event.type) {
      case 'signals':
        return this.evaluate(state, this.candidateFor(event.snapshot), event.at);
      case 'tick':
        return this.elapse(state, event.at);
      case 'override':
        return this.applyOverride(state, event.override, event.at);
    }
  }

  /**
   * Folds a sequence of events, returning every intermediate state
   */
  run(state: ModeMachineState, events: readonly ModeMachineEvent[]): ModeMachineState[] {
    const states: ModeMachineState[] = [];
    let next = state;
    for (const event of events) {
      next = this.transition(next, event);
      states.push(next);
    }
    return states;
  }

  private evaluate(state: ModeMachineState, candidate: LocationMode, at: number): ModeMachineState {
    if (state.override.active) {
      // candidate still tracked for display, never committed
      return { ...state, candidate, pendingSince: null };
    }

    if (candidate === state.current) {
      return { ...state, candidate, pendingSince: null };
    }

    if (this.dwellMs === 0) {
      return { ...state, current: candidate, candidate, pendingSince: null };
    }

    if (candidate === state.candidate && state.pendingSince !== null) {
      // same candidate re-reported: keep the running dwell
      return this.elapse(state, at);
    }

    return { ...state, candidate, pendingSince: at };
  }

  private elapse(state: ModeMachineState, at: number): ModeMachineState {
    if (state.override.active || state.pendingSince === null) {
      return state;
    }
    if (at - state.pendingSince < this.dwellMs) {
      return state;
    }
    return { ...state, current: state.candidate, pendingSince: null };
  }

  private applyOverride(
    state: ModeMachineState,
    override: OverrideState,
    at: number
  ): ModeMachineState {
    if (override.active) {
      return {
        ...state,
        current: override.pinnedMode ?? state.current,
        pendingSince: null,
        override,
      };
    }

    // cleared: the last known candidate competes again from scratch
    const released: ModeMachineState = {
      ...state,
      candidate: state.current,
      pendingSince: null,
      override: INACTIVE_OVERRIDE,
    };
    return this.evaluate(released, state.candidate, at);
  }
}
