/**
 * Context Builder — turns form input into the render context.
 *
 * Manually entered placeholders are looked up by their sanitized key and
 * stored twice: under the raw placeholder (for filename derivation) and
 * under the sanitized key (for rendering). Excluded placeholders are never
 * offered in the form; when a contact is selected, the bound contact field
 * is written under the placeholder's literal name instead.
 */

import type { Contact, ContactField } from "../contacts/store.js";
import { isSanitizedKey, sanitizePlaceholder, type SanitizedKey } from "../templates/identifier.js";
import { sortPlaceholders } from "../templates/placeholders.js";
import { ABSENT, fieldValue, fromInput, RenderContext, type FieldValue } from "./render_context.js";

/** Excluded placeholder literal → contact field injected under it. */
export type ContactBindings = ReadonlyMap<string, ContactField>;

export const DEFAULT_CONTACT_BINDINGS: ContactBindings = new Map<string, ContactField>([
  ["Salesperson_Name", "name"],
  ["Salesperson_Email", "email"],
  ["Salesperson_Phone", "phone"],
]);

export interface ManualField {
  placeholder: string;
  key: SanitizedKey;
}

export interface ContextInput {
  placeholders: Iterable<string>;
  /** Placeholders filled from the selected contact, never from the form. */
  excluded: ReadonlySet<string>;
  /** Submitted values keyed by sanitized key. */
  formValues: Readonly<Record<string, unknown>>;
  contact?: Contact;
  contactBindings?: ContactBindings;
}

export interface BuiltContext {
  rawValues: Map<string, FieldValue>;
  context: RenderContext;
  manualFields: ManualField[];
}

/**
 * Sorted placeholders the user has to fill in by hand. Placeholders that
 * sanitize to nothing are dropped; `buildMapping` reports them separately.
 */
export function manualFieldsFor(
  placeholders: Iterable<string>,
  excluded: ReadonlySet<string>,
): ManualField[] {
  const fields: ManualField[] = [];
  for (const placeholder of sortPlaceholders(new Set(placeholders))) {
    if (excluded.has(placeholder)) continue;
    const key = sanitizePlaceholder(placeholder);
    if (!isSanitizedKey(key)) continue;
    fields.push({ placeholder, key });
  }
  return fields;
}

export function buildContext(input: ContextInput): BuiltContext {
  const bindings = input.contactBindings ?? DEFAULT_CONTACT_BINDINGS;
  const manualFields = manualFieldsFor(input.placeholders, input.excluded);
  const rawValues = new Map<string, FieldValue>();
  const context = new RenderContext();

  for (const { placeholder, key } of manualFields) {
    const value = Object.prototype.hasOwnProperty.call(input.formValues, key)
      ? fromInput(input.formValues[key])
      : ABSENT;
    rawValues.set(placeholder, value);
    context.set(key, value);
  }

  if (input.contact) {
    for (const placeholder of sortPlaceholders(new Set(input.placeholders))) {
      if (!input.excluded.has(placeholder)) continue;
      const field = bindings.get(placeholder);
      if (!field) continue;
      context.set(placeholder, fieldValue(input.contact[field]));
    }
  }

  return { rawValues, context, manualFields };
}
