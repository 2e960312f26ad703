import type { LocationMode } from './LocationMode.js';

export type RgbColor = readonly [number, number, number];

/**
 * Light state to apply when a mode becomes current.
 * A reaction setting neither color, brightness nor `off` leaves the light
 * untouched; `transition` alone has nothing to fade to.
 */
export interface LightReaction {
  rgb?: RgbColor;
  /** 0-255 */
  brightness?: number;
  /** Seconds */
  transition?: number;
  off?: boolean;
}

/**
 * A light entity plus the reactions configured specifically for it
 */
export interface LightTarget {
  entityId: string;
  reactions: Partial<Record<LocationMode, LightReaction>>;
}

export type FlashLength = 'short' | 'long';

/**
 * Transient effect played once on entering Home, before the steady Home reaction
 */
export interface ArrivalFlourish {
  durationSeconds: number;
  flash: FlashLength;
  rgb?: RgbColor;
  brightness?: number;
  /** Play at most once per day, tracked by a generated helper */
  oncePerDay: boolean;
}

/**
 * Where a resolved reaction came from
 */
export type ReactionSource = 'entity' | 'colors' | 'default' | 'fallback';

export interface TurnOnAction {
  kind: 'turn_on';
  entityId: string;
  rgb?: RgbColor;
  brightness?: number;
  transition?: number;
  flash?: FlashLength;
  source: ReactionSource | 'flourish';
}

export interface TurnOffAction {
  kind: 'turn_off';
  entityId: string;
  transition?: number;
  source: ReactionSource;
}

/**
 * Neutral action: the light keeps whatever state it has
 */
export interface NoChangeAction {
  kind: 'no_change';
  entityId: string;
  source: ReactionSource;
}

/**
 * Concrete per-entity action produced by the lighting mapper
 */
export type LightAction = TurnOnAction | TurnOffAction | NoChangeAction;

/**
 * One ordered step of a mode's lighting sequence
 */
export type LightingStep =
  | { type: 'action'; action: LightAction }
  | { type: 'wait'; seconds: number };

/**
 * True when the reaction carries no target state to apply
 */
export function isEmptyReaction(reaction: LightReaction): boolean {
  return reaction.rgb === undefined && reaction.brightness === undefined && reaction.off !== true;
}
