#!/usr/bin/env tsx
/**
 * CLI: docgen:generate
 *
 * Usage:
 *   npm run docgen:generate -- --template "Proposal Template.docx" \
 *     --values values.json [--contact 0]
 *
 * values.json maps either raw placeholders ("Client Company Name") or
 * sanitized keys ("Client_Company_Name") to strings.
 */

import "dotenv/config";
import { existsSync, readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

import { ContactStore } from "../contacts/store.js";
import { DocumentGenerator } from "../generation/pipeline.js";
import { ensureDirectories, loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { sanitizePlaceholder } from "../templates/identifier.js";

const ValuesFileSchema = z.record(z.string());

function parseArgs(args: string[]): { template: string; values: string; contact?: number } {
  let template = "";
  let values = "";
  let contact: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === "--template" && next !== undefined) {
      template = next;
      i++;
    } else if (args[i] === "--values" && next !== undefined) {
      values = next;
      i++;
    } else if (args[i] === "--contact" && next !== undefined) {
      contact = Number(next);
      i++;
    }
  }
  return { template, values, contact };
}

export type ValuesFileResult =
  | { ok: true; values: Record<string, string> }
  | { ok: false; message: string };

/**
 * Read a values file, keying every entry by its sanitized name so raw
 * placeholder names work too.
 */
export function readValuesFile(valuesPath: string): ValuesFileResult {
  if (!existsSync(valuesPath)) {
    return { ok: false, message: `Values file not found: ${valuesPath}` };
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(valuesPath, "utf-8"));
  } catch (err) {
    return { ok: false, message: `Values file is not valid JSON: ${valuesPath} (${errorMessage(err)})` };
  }

  const parsed = ValuesFileSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, message: `Values file must map field names to strings: ${valuesPath}` };
  }

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    values[sanitizePlaceholder(key)] = value;
  }
  return { ok: true, values };
}

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  if (!args.template || !args.values) {
    console.error("Usage: docgen:generate -- --template <name> --values <file.json> [--contact <index>]");
    return 1;
  }

  const read = readValuesFile(path.resolve(args.values));
  if (!read.ok) {
    console.error(read.message);
    return 1;
  }

  const config = loadConfig();
  ensureDirectories(config);
  const generator = new DocumentGenerator(config, new ContactStore(config.contactsFile));
  const result = generator.generate({
    template: args.template,
    values: read.values,
    contactIndex: args.contact,
  });

  if (!result.ok) {
    console.error(`  ✗ ${result.notice}`);
    return 1;
  }
  console.log(`  Placeholders: ${result.placeholders.length}`);
  console.log(`  ✓ ${result.outputPath}`);
  return 0;
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = main();
}
