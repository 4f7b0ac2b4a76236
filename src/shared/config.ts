/**
 * Application configuration.
 *
 * Built once from environment variables (see `.env.example`) and passed
 * explicitly to every component; nothing reads `process.env` afterwards.
 */

import { mkdirSync } from "fs";
import path from "path";
import { z } from "zod";

import type { ContactField } from "../contacts/store.js";
import { isSanitizedKey } from "../templates/identifier.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_FILENAME_OPTIONS, type FilenameOptions } from "../generation/filename.js";

export interface AppConfig {
  port: number;
  templatesDir: string;
  sanitizedDir: string;
  outputDir: string;
  contactsFile: string;
  /** Excluded placeholder literal → contact field. Keys form the exclusion set. */
  contactBindings: ReadonlyMap<string, ContactField>;
  filename: FilenameOptions;
}

const CONTACT_FIELDS = ["name", "email", "phone"] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  TEMPLATES_DIR: z.string().min(1).default("templates"),
  SANITIZED_DIR: z.string().min(1).default("sanitized_templates"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  CONTACTS_FILE: z.string().min(1).default("contacts.csv"),
  CONTACT_BINDINGS: z
    .string()
    .default("Salesperson_Name=name,Salesperson_Email=email,Salesperson_Phone=phone"),
  FILENAME_CLIENT_FIELD: z.string().min(1).default(DEFAULT_FILENAME_OPTIONS.clientField),
  FILENAME_DATE_FIELD: z.string().min(1).default(DEFAULT_FILENAME_OPTIONS.dateField),
});

const BindingSchema = z.tuple([
  z.string().refine(isSanitizedKey, { message: "placeholder must be an identifier" }),
  z.enum(CONTACT_FIELDS),
]);

/**
 * Parse `Placeholder=field` pairs separated by commas.
 * An empty string means no contact injection at all.
 */
export function parseContactBindings(raw: string): Map<string, ContactField> {
  const bindings = new Map<string, ContactField>();
  for (const pair of raw.split(",").map((p) => p.trim()).filter(Boolean)) {
    const parsed = BindingSchema.safeParse(pair.split("=").map((s) => s.trim()));
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid CONTACT_BINDINGS entry "${pair}": ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    const [placeholder, field] = parsed.data;
    bindings.set(placeholder, field);
  }
  return bindings;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  baseDir: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue?.path.join(".")} ${issue?.message}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    templatesDir: path.resolve(baseDir, e.TEMPLATES_DIR),
    sanitizedDir: path.resolve(baseDir, e.SANITIZED_DIR),
    outputDir: path.resolve(baseDir, e.OUTPUT_DIR),
    contactsFile: path.resolve(baseDir, e.CONTACTS_FILE),
    contactBindings: parseContactBindings(e.CONTACT_BINDINGS),
    filename: {
      ...DEFAULT_FILENAME_OPTIONS,
      clientField: e.FILENAME_CLIENT_FIELD,
      dateField: e.FILENAME_DATE_FIELD,
    },
  };
}

/** Create the sanitized-template and output directories. */
export function ensureDirectories(config: AppConfig): void {
  mkdirSync(config.sanitizedDir, { recursive: true });
  mkdirSync(config.outputDir, { recursive: true });
}
