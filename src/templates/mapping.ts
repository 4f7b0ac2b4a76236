/**
 * Placeholder → SanitizedKey mapping for a single generation request.
 *
 * Collisions are rejected rather than resolved: if "Client Name" and
 * "Client-Name" both become `Client_Name`, one form field would silently
 * feed two placeholders.
 */

import { PlaceholderCollisionError } from "../shared/errors.js";
import { isSanitizedKey, sanitizePlaceholder, type SanitizedKey } from "./identifier.js";

export type PlaceholderMapping = ReadonlyMap<string, SanitizedKey>;

export interface CollisionGroup {
  key: string;
  placeholders: string[];
}

/**
 * Group placeholders by sanitized key and return every group that is not a
 * clean one-to-one pair. A placeholder that sanitizes to "" is reported
 * under the empty key.
 */
export function findCollisions(placeholders: Iterable<string>): CollisionGroup[] {
  const byKey = new Map<string, string[]>();
  for (const ph of new Set(placeholders)) {
    const key = sanitizePlaceholder(ph);
    const group = byKey.get(key);
    if (group) group.push(ph);
    else byKey.set(key, [ph]);
  }

  const collisions: CollisionGroup[] = [];
  for (const [key, group] of byKey) {
    if (group.length > 1 || !isSanitizedKey(key)) {
      collisions.push({ key, placeholders: [...group].sort() });
    }
  }
  return collisions.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/** Build the mapping, throwing {@link PlaceholderCollisionError} on collision. */
export function buildMapping(placeholders: Iterable<string>): PlaceholderMapping {
  const list = [...new Set(placeholders)];
  const collisions = findCollisions(list);
  if (collisions.length > 0) {
    throw new PlaceholderCollisionError(collisions);
  }

  const mapping = new Map<string, SanitizedKey>();
  for (const ph of list) {
    const key = sanitizePlaceholder(ph);
    if (isSanitizedKey(key)) mapping.set(ph, key);
  }
  return mapping;
}
