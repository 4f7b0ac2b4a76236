/**
 * Filename Deriver — `Proposal_<client>_<date>.docx` from raw field values.
 *
 * Field names match case-insensitively after trimming, and unsafe path
 * characters in the values are replaced so a client name such as
 * "../Acme" cannot leave the output directory.
 */

import { textOf, type FieldValue } from "./render_context.js";

export interface FilenameOptions {
  clientField: string;
  dateField: string;
  clientDefault: string;
  dateDefault: string;
  prefix: string;
}

export const DEFAULT_FILENAME_OPTIONS: FilenameOptions = {
  clientField: "Client Company Name",
  dateField: "Proposal date",
  clientDefault: "UnknownClient",
  dateDefault: "UnknownDate",
  prefix: "Proposal",
};

const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\x00-\x1f]/g;

/**
 * Value of the first key equal to `target` ignoring case and surrounding
 * whitespace. Falls back to `fallback` when no key matches or the value is
 * absent or blank.
 */
export function valueCaseInsensitive(
  values: ReadonlyMap<string, FieldValue>,
  target: string,
  fallback: string,
): string {
  const wanted = target.trim().toLowerCase();
  for (const [key, value] of values) {
    if (key.trim().toLowerCase() !== wanted) continue;
    const text = textOf(value)?.trim();
    return text ? text : fallback;
  }
  return fallback;
}

/** Replace path separators, reserved and control characters with `_`. */
export function safeFilenameComponent(value: string, fallback: string): string {
  const safe = value.replace(UNSAFE_FILENAME_CHARS, "_");
  return /^\.*$/.test(safe) ? fallback : safe;
}

export function deriveOutputFilename(
  rawValues: ReadonlyMap<string, FieldValue>,
  options: Partial<FilenameOptions> = {},
): string {
  const opts = { ...DEFAULT_FILENAME_OPTIONS, ...options };
  const client = safeFilenameComponent(
    valueCaseInsensitive(rawValues, opts.clientField, opts.clientDefault),
    opts.clientDefault,
  );
  const date = safeFilenameComponent(
    valueCaseInsensitive(rawValues, opts.dateField, opts.dateDefault),
    opts.dateDefault,
  );
  return `${opts.prefix}_${client}_${date}.docx`;
}
