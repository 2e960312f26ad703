/**
 * Raw, unvalidated settings as submitted by the form
 */
export type RawSettings = Record<string, unknown>;

/**
 * Port for keeping the last submitted settings so the form can be re-edited
 */
export interface ISettingsStore {
  load(): Promise<RawSettings>;
  save(settings: RawSettings): Promise<void>;
}
