/**
 * Render context — the key→value data handed to the template engine.
 *
 * Keys are validated on insertion, so an unsafe identifier can never reach
 * docxtemplater. Values are explicit: a field either carries text or is
 * absent; there is no `null` in between.
 */

import { isSanitizedKey, toSanitizedKey, type SanitizedKey } from "../templates/identifier.js";

export type FieldValue =
  | { readonly kind: "value"; readonly text: string }
  | { readonly kind: "absent" };

export const ABSENT: FieldValue = { kind: "absent" };

export function fieldValue(text: string): FieldValue {
  return { kind: "value", text };
}

/** Coerce untyped form input: only strings count as present. */
export function fromInput(input: unknown): FieldValue {
  return typeof input === "string" ? fieldValue(input) : ABSENT;
}

export function textOf(value: FieldValue | undefined): string | undefined {
  return value?.kind === "value" ? value.text : undefined;
}

export class RenderContext {
  private readonly entries = new Map<SanitizedKey, FieldValue>();

  /** Throws `InvalidContextKeyError` when `key` is not identifier-safe. */
  set(key: string, value: FieldValue): this {
    this.entries.set(toSanitizedKey(key), value);
    return this;
  }

  get(key: string): FieldValue {
    if (!isSanitizedKey(key)) return ABSENT;
    return this.entries.get(key) ?? ABSENT;
  }

  has(key: string): boolean {
    return this.get(key).kind === "value";
  }

  keys(): SanitizedKey[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** Plain data for the template engine; absent fields are omitted. */
  toTemplateData(): Record<string, string> {
    const data: Record<string, string> = {};
    for (const [key, value] of this.entries) {
      if (value.kind === "value") data[key] = value.text;
    }
    return data;
  }
}
