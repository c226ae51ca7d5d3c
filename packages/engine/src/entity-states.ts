/**
 * Entity state tables: binary sensor wording and icon lookups by device
 * class and domain. Parsed from entity-states.json by the asset catalog.
 */

export interface EntityStateTables {
  /** Device class to [on wording, off wording] */
  binarySensor: Readonly<Record<string, readonly [string, string]>>;
  deviceClassIcons: Readonly<Record<string, string>>;
  domainIcons: Readonly<Record<string, string>>;
}

/** Anything that carries the tables: a RenderContext or the catalog */
export interface EntityStateSource {
  readonly entityStates: EntityStateTables;
}

export const EMPTY_ENTITY_STATES: EntityStateTables = { binarySensor: {}, deviceClassIcons: {}, domainIcons: {} };

function stringEntries(value: unknown): Array<[string, string]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return [];
  return Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === "string");
}

function isPair(value: unknown): value is [string, string] {
  return Array.isArray(value) && value.length === 2 && value.every((v) => typeof v === "string");
}

/**
 * Keep the well-formed entries of a tables document
 */
export function parseEntityStateTables(value: unknown): EntityStateTables {
  if (typeof value !== "object" || value === null) return EMPTY_ENTITY_STATES;

  const binarySensor: Record<string, [string, string]> = {};
  if ("binarySensor" in value && typeof value.binarySensor === "object" && value.binarySensor !== null) {
    for (const [deviceClass, pair] of Object.entries(value.binarySensor)) {
      if (isPair(pair)) binarySensor[deviceClass] = pair;
    }
  }

  return {
    binarySensor,
    deviceClassIcons: Object.fromEntries(stringEntries("deviceClassIcons" in value ? value.deviceClassIcons : null)),
    domainIcons: Object.fromEntries(stringEntries("domainIcons" in value ? value.domainIcons : null)),
  };
}
