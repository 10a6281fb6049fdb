import { LiveRecord, Tombstone, versionOf } from '../types';

/**
 * Stable serialization used to break timestamp ties. Keys are sorted and
 * tag id sets are ordered, so two devices holding the same version always
 * produce the same string.
 */
export function canonicalize(record: LiveRecord): string {
  const entries = Object.entries(record)
    .map(([key, value]): [string, unknown] =>
      Array.isArray(value) ? [key, [...value].sort()] : [key, value ?? null]
    )
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

/**
 * Orders two versions of the same record. Later `updated_at` wins; on a
 * tie the greater canonical form wins. Returns 0 only for identical
 * versions.
 */
export function compareVersions(incoming: LiveRecord, stored: LiveRecord): number {
  const a = versionOf(incoming);
  const b = versionOf(stored);
  if (a !== b) {
    return a > b ? 1 : -1;
  }
  const ca = canonicalize(incoming);
  const cb = canonicalize(stored);
  if (ca === cb) return 0;
  return ca > cb ? 1 : -1;
}

export function shouldReplace(incoming: LiveRecord, stored: LiveRecord | undefined): boolean {
  return stored === undefined || compareVersions(incoming, stored) > 0;
}

// Deletion wins ties against edits.
export function isShadowedBy(version: string, tombstone: Tombstone | undefined): boolean {
  return tombstone !== undefined && tombstone.deleted_at >= version;
}

export function supersedesTombstone(incoming: Tombstone, existing: Tombstone | undefined): boolean {
  return existing === undefined || incoming.deleted_at > existing.deleted_at;
}
