import { describe, it, expect } from 'vitest';
import { createPackageNames, formatDuration, jinjaString, objectIdOf, statesOf } from './PackageNames.js';

describe('PackageNames', () => {
  it('should derive every entity id from the prefix', () => {
    const names = createPackageNames('upstairs');

    expect(names.modeSelect).toBe('input_select.upstairs_location_mode');
    expect(names.overrideToggle).toBe('input_boolean.upstairs_override');
    expect(names.overrideModeSelect).toBe('input_select.upstairs_override_mode');
    expect(names.dwellTimer).toBe('timer.upstairs_mode_dwell');
    expect(names.candidateSensor).toBe('sensor.upstairs_candidate_mode');
    expect(names.automationId('commit_mode')).toBe('upstairs_commit_mode');
    expect(names.automationAlias('Commit mode after dwell')).toBe(
      'Location Lighting Mode [upstairs] - Commit mode after dwell'
    );
  });

  it('should strip the domain from an entity id', () => {
    expect(objectIdOf('timer.llm_mode_dwell')).toBe('llm_mode_dwell');
  });

  it('should format durations as HH:MM:SS', () => {
    expect(formatDuration(0)).toBe('00:00:00');
    expect(formatDuration(90)).toBe('00:01:30');
    expect(formatDuration(3725)).toBe('01:02:05');
  });

  it('should escape quotes and backslashes in Jinja strings', () => {
    expect(jinjaString("it's")).toBe("'it\\'s'");
    expect(jinjaString('a\\b')).toBe("'a\\\\b'");
    expect(statesOf('sensor.llm_candidate_mode')).toBe("states('sensor.llm_candidate_mode')");
  });
});
