/**
 * Placeholder → identifier sanitization.
 *
 * "Client Company Name" → "Client_Company_Name"
 * "  Proposal date: " → "Proposal_date"
 *
 * Letters and digits are Unicode-aware, so "Société" stays "Société".
 */

import { InvalidContextKeyError } from "../shared/errors.js";

/** A string that is safe to use as a template tag and context key. */
export type SanitizedKey = string & { readonly __brand: "SanitizedKey" };

const NON_IDENTIFIER_RUN = /[^\p{L}\p{N}_]+/gu;
const EDGE_UNDERSCORES = /^_+|_+$/g;
const SANITIZED_KEY_RE = /^[\p{L}\p{N}](?:[\p{L}\p{N}_]*[\p{L}\p{N}])?$/u;

/**
 * Replace every run of non-identifier characters with one underscore, then
 * trim underscores from both ends. Idempotent.
 */
export function sanitizePlaceholder(placeholder: string): string {
  return placeholder.replace(NON_IDENTIFIER_RUN, "_").replace(EDGE_UNDERSCORES, "");
}

export function isSanitizedKey(value: string): value is SanitizedKey {
  return SANITIZED_KEY_RE.test(value);
}

/** Validate an already-safe name (e.g. `Salesperson_Name`) as a key. */
export function toSanitizedKey(value: string): SanitizedKey {
  if (!isSanitizedKey(value)) {
    throw new InvalidContextKeyError(value);
  }
  return value;
}
