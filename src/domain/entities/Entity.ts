/**
 * Represents the domain of an entity (light, input_select, timer, ...)
 */
export type EntityDomain =
  | 'light'
  | 'binary_sensor'
  | 'sensor'
  | 'device_tracker'
  | 'person'
  | 'zone'
  | 'group'
  | 'input_boolean'
  | 'input_select'
  | 'timer'
  | 'automation'
  | string;

const ENTITY_ID_PATTERN = /^[a-z0-9_]+\.[a-z0-9_]+$/;

/**
 * Checks the `domain.object_id` shape Home Assistant requires
 */
export function isEntityId(value: string): boolean {
  return ENTITY_ID_PATTERN.test(value);
}

/**
 * Extracts the domain from an entity_id
 */
export function getEntityDomain(entityId: string): EntityDomain {
  const [domain] = entityId.split('.');
  return domain;
}

/**
 * Builds an entity_id from a domain and an object id
 */
export function buildEntityId(domain: EntityDomain, objectId: string): string {
  return `${domain}.${objectId}`;
}
