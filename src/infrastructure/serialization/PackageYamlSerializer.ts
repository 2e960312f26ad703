import { stringify } from 'yaml';
import type { AutomationPackage } from '../../domain/entities/AutomationPackage.js';

export const PACKAGE_HEADER = [
  '# Generated by location-lighting-mode. Do not edit by hand:',
  '# this file is replaced on every Apply.',
].join('\n');

/**
 * Drops top-level sections with nothing to declare
 */
function withoutEmptySections(document: AutomationPackage): Record<string, unknown> {
  const sections: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document)) {
    const empty = Array.isArray(value)
      ? value.length === 0
      : typeof value === 'object' && value !== null && Object.keys(value).length === 0;
    if (!empty) sections[key] = value;
  }
  return sections;
}

/**
 * Serializes a package as Home Assistant YAML.
 * YAML 1.1 rules quote `on`/`off` so they stay strings; shared objects are
 * written out in full instead of as anchors.
 */
export function serializePackage(document: AutomationPackage): string {
  const body = stringify(withoutEmptySections(document), {
    version: '1.1',
    lineWidth: 0,
    aliasDuplicateObjects: false,
  });
  return `${PACKAGE_HEADER}\n${body}`;
}
