/**
 * Template Rewriter — writes a sanitized copy of a DOCX template.
 *
 * The archive is unpacked into a scratch directory, `word/document.xml` is
 * rewritten so each known placeholder becomes `{{<SanitizedKey>}}`, and the
 * tree is repacked with DEFLATE to `<destination>/sanitized_<basename>`.
 * Unknown tokens, including stray literal `{{ }}`, stay byte-for-byte.
 * The original template is never modified.
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { globSync } from "glob";
import PizZip from "pizzip";

import { createLogger } from "../shared/log.js";
import { cleanPlaceholderToken, DOCUMENT_XML_PATH, PLACEHOLDER_PATTERN } from "./placeholders.js";
import type { PlaceholderMapping } from "./mapping.js";

export const SANITIZED_PREFIX = "sanitized_";
const CONTENT_TYPES = "[Content_Types].xml";

const log = createLogger("rewriter");

export interface RewriteOptions {
  /** Parent of the per-call scratch directory. Defaults to the OS temp dir. */
  scratchRoot?: string;
}

export function sanitizedCopyName(templatePath: string): string {
  return SANITIZED_PREFIX + path.basename(templatePath);
}

/** Replace mapped placeholders in markup; everything else is untouched. */
export function rewritePlaceholders(xml: string, mapping: PlaceholderMapping): string {
  return xml.replace(PLACEHOLDER_PATTERN, (full: string, inner: string) => {
    const key = mapping.get(cleanPlaceholderToken(inner));
    return key === undefined ? full : `{{${key}}}`;
  });
}

/** Write every archive member below `dir`, refusing paths that escape it. */
function unpackArchive(zip: PizZip, dir: string): void {
  const root = path.resolve(dir);
  for (const [name, entry] of Object.entries(zip.files)) {
    const target = path.resolve(root, name);
    if (target !== root && !target.startsWith(root + path.sep)) {
      throw new Error(`Archive member escapes extraction root: ${name}`);
    }
    if (entry.dir) {
      mkdirSync(target, { recursive: true });
      continue;
    }
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, entry.asNodeBuffer());
  }
}

/** Zip every file below `dir` with archive names relative to it. */
function packDirectory(dir: string): Buffer {
  const files = globSync("**/*", { cwd: dir, nodir: true, dot: true, posix: true }).sort(
    (a, b) => {
      if (a === CONTENT_TYPES) return -1;
      if (b === CONTENT_TYPES) return 1;
      return a < b ? -1 : a > b ? 1 : 0;
    },
  );

  const zip = new PizZip();
  for (const rel of files) {
    zip.file(rel, readFileSync(path.join(dir, rel)));
  }
  return Buffer.from(
    zip.generate({ type: "nodebuffer", compression: "DEFLATE" }),
  );
}

/**
 * Produce `<destinationDir>/sanitized_<basename>` from `templatePath`.
 *
 * Returns the new path, or `null` when the source cannot be unpacked, the
 * main document part is missing or unreadable, or a write fails. The
 * scratch directory is removed in every case.
 */
export function rewriteTemplate(
  templatePath: string,
  mapping: PlaceholderMapping,
  destinationDir: string,
  options: RewriteOptions = {},
): string | null {
  let scratch: string;
  try {
    scratch = mkdtempSync(path.join(options.scratchRoot ?? tmpdir(), "docgen-"));
  } catch (err) {
    log.error("Error creating scratch directory", err);
    return null;
  }

  try {
    try {
      unpackArchive(new PizZip(readFileSync(templatePath)), scratch);
    } catch (err) {
      log.error(`Error unpacking ${templatePath}`, err);
      return null;
    }

    const xmlPath = path.join(scratch, ...DOCUMENT_XML_PATH.split("/"));
    let xml: string;
    try {
      xml = readFileSync(xmlPath, "utf-8");
    } catch (err) {
      log.error(`Error reading ${DOCUMENT_XML_PATH}`, err);
      return null;
    }

    try {
      writeFileSync(xmlPath, rewritePlaceholders(xml, mapping), "utf-8");
    } catch (err) {
      log.error(`Error writing modified ${DOCUMENT_XML_PATH}`, err);
      return null;
    }

    const outPath = path.join(destinationDir, sanitizedCopyName(templatePath));
    try {
      mkdirSync(destinationDir, { recursive: true });
      writeFileSync(outPath, packDirectory(scratch));
    } catch (err) {
      log.error(`Error writing sanitized template ${outPath}`, err);
      return null;
    }
    return outPath;
  } finally {
    rmSync(scratch, { recursive: true, force: true });
  }
}
