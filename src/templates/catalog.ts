/**
 * Template Catalog — discovers original DOCX templates on disk.
 *
 * A template is any `*Template*.docx` in the templates directory whose
 * basename does not start with `sanitized_`. Templates are addressed by
 * basename only; paths supplied by clients are never opened directly.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { createHash } from "crypto";
import path from "path";
import { globSync } from "glob";

import { TemplateUploadError } from "../shared/errors.js";
import { extractPlaceholdersFromBuffer } from "./placeholders.js";
import { SANITIZED_PREFIX } from "./rewriter.js";

export interface TemplateEntry {
  name: string;
  path: string;
  /** SHA-256 of the DOCX bytes. */
  sha256: string;
  placeholderCount: number;
}

export interface IngestResult {
  template: TemplateEntry;
  placeholders: string[];
}

/** True for basenames the catalog lists. */
export function isTemplateName(name: string): boolean {
  return (
    path.basename(name) === name &&
    name.includes("Template") &&
    name.toLowerCase().endsWith(".docx") &&
    !name.startsWith(SANITIZED_PREFIX)
  );
}

export class TemplateCatalog {
  constructor(private readonly templatesDir: string) {}

  list(): TemplateEntry[] {
    if (!existsSync(this.templatesDir)) return [];
    return globSync("*Template*.docx", { cwd: this.templatesDir, nodir: true })
      .filter(isTemplateName)
      .sort()
      .map((name) => this.describe(name));
  }

  /** Absolute path of a listed template, or `null`. */
  resolve(name: string): string | null {
    if (!isTemplateName(name)) return null;
    const full = path.join(this.templatesDir, name);
    return existsSync(full) ? full : null;
  }

  /**
   * Store an uploaded template under its original basename, replacing any
   * template of the same name. Rejected uploads throw
   * `TemplateUploadError`; storage failures propagate as they are.
   */
  ingest(docx: Buffer, originalName: string): IngestResult {
    const name = path.basename(originalName);
    if (!isTemplateName(name)) {
      throw new TemplateUploadError(
        `Template file name must contain "Template", end in .docx and not start with "${SANITIZED_PREFIX}"`,
      );
    }
    const placeholders = extractPlaceholdersFromBuffer(docx).sort();
    if (placeholders.length === 0) {
      throw new TemplateUploadError("No placeholders found in the uploaded template.");
    }

    mkdirSync(this.templatesDir, { recursive: true });
    writeFileSync(path.join(this.templatesDir, name), docx);
    return { template: this.describe(name), placeholders };
  }

  private describe(name: string): TemplateEntry {
    const full = path.join(this.templatesDir, name);
    const bytes = readFileSync(full);
    return {
      name,
      path: full,
      sha256: createHash("sha256").update(bytes).digest("hex"),
      placeholderCount: extractPlaceholdersFromBuffer(bytes).length,
    };
  }
}
