/**
 * Placeholder Extractor — finds `{{ ... }}` tokens in a DOCX main document.
 *
 * Word often splits a placeholder across several runs, e.g.
 *   `{{Client </w:t></w:r><w:r><w:t>Company Name}}`
 * so the span between the delimiters may contain XML tags. Those are stripped
 * before the token is trimmed. Pairs are matched across line breaks.
 */

import { readFileSync } from "fs";
import PizZip from "pizzip";
import { createLogger } from "../shared/log.js";

export const DOCUMENT_XML_PATH = "word/document.xml";

/** `{{` … `}}`, non-greedy, dot matches newlines. */
export const PLACEHOLDER_PATTERN = /\{\{([\s\S]*?)\}\}/g;
const XML_TAG_PATTERN = /<[^>]+>/g;

const log = createLogger("placeholders");

/** Strip embedded XML tags from the inner span of a token and trim it. */
export function cleanPlaceholderToken(inner: string): string {
  return inner.replace(XML_TAG_PATTERN, "").trim();
}

/** Distinct cleaned placeholders in a markup string, in first-seen order. */
export function scanPlaceholders(xml: string): string[] {
  const found = new Set<string>();
  for (const match of xml.matchAll(PLACEHOLDER_PATTERN)) {
    const cleaned = cleanPlaceholderToken(match[1]);
    if (cleaned) found.add(cleaned);
  }
  return [...found];
}

/** Ordinary code-unit order, case-sensitive ("Z" before "a"). */
export function sortPlaceholders(placeholders: Iterable<string>): string[] {
  return [...placeholders].sort();
}

/** Read the main document part of a DOCX archive. Throws on any failure. */
export function readDocumentXml(docx: Buffer): string {
  const zip = new PizZip(docx);
  const entry = zip.file(DOCUMENT_XML_PATH);
  if (!entry) {
    throw new Error(`${DOCUMENT_XML_PATH} not found in archive`);
  }
  return entry.asText();
}

/**
 * Extract the distinct placeholders of a DOCX file.
 *
 * Never throws: an unreadable file, a broken archive or a missing
 * `word/document.xml` is logged and yields `[]`.
 */
export function extractPlaceholders(docxPath: string): string[] {
  let xml: string;
  try {
    xml = readDocumentXml(readFileSync(docxPath));
  } catch (err) {
    log.error(`Error reading the DOCX file ${docxPath}`, err);
    return [];
  }
  return scanPlaceholders(xml);
}

/** Same as {@link extractPlaceholders} for an in-memory archive. */
export function extractPlaceholdersFromBuffer(docx: Buffer): string[] {
  try {
    return scanPlaceholders(readDocumentXml(docx));
  } catch (err) {
    log.error("Error reading the DOCX buffer", err);
    return [];
  }
}
