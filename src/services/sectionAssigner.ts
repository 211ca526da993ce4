// src/services/sectionAssigner.ts
import type { SectionMapping, SectionRanges } from "../types/results";
import { UNASSIGNED_SECTION, byKey, normalizeIdentifier } from "../helpers/markRules";

/** Last contiguous digit run, e.g. "1XY22CS045" → 45. */
export function extractSerial(value: string): number | null {
  const runs = value.match(/\d+/g);
  if (!runs) return null;
  return parseInt(runs[runs.length - 1], 10);
}

/**
 * Keys are read in sorted order, so when two spellings of one identifier
 * collide the outcome does not depend on the order they were sent in.
 */
export function normalizeMapping(mapping: SectionMapping = {}): Map<string, string> {
  const normalized = new Map<string, string>();
  const entries = Object.entries(mapping).sort(([a], [b]) => byKey(a, b));
  for (const [id, section] of entries) {
    const key = normalizeIdentifier(id);
    if (!key) continue;
    normalized.set(key, String(section).trim());
  }
  return normalized;
}

/**
 * Explicit mapping first, then the first numeric range that contains the
 * identifier's serial, then the sheet's own Section value, then "Unassigned".
 * Ranges are tried in object key order: integer-like names ("2", "10")
 * come first in ascending order, the rest follow in the order given.
 */
export function assignSection(
  studentId: string,
  ranges: SectionRanges = {},
  mapping: SectionMapping | Map<string, string> = {},
  declaredSection?: string
): string {
  const lookup = mapping instanceof Map ? mapping : normalizeMapping(mapping);
  const explicit = lookup.get(normalizeIdentifier(studentId));
  if (explicit) return explicit;

  const serial = extractSerial(studentId);
  if (serial !== null) {
    for (const [name, [start, end]] of Object.entries(ranges)) {
      const low = extractSerial(String(start));
      const high = extractSerial(String(end));
      if (low === null || high === null) continue;
      if (serial >= Math.min(low, high) && serial <= Math.max(low, high)) return name;
    }
  }

  const declared = declaredSection?.trim();
  return declared ? declared : UNASSIGNED_SECTION;
}
