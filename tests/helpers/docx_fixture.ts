/**
 * In-memory DOCX fixtures.
 *
 * Builds the smallest package Word and docxtemplater accept:
 * content types, package rels, and a main document made of the given
 * paragraphs. Each paragraph is a list of run texts, so a placeholder can
 * be split across runs the way Word does it.
 */

import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import PizZip from "pizzip";

const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

export const CONTENT_TYPES_XML =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
  "</Types>";

export const PACKAGE_RELS_XML =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
  '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
  "</Relationships>";

export const DOCUMENT_RELS_XML =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>';

export function run(text: string): string {
  return `<w:r><w:t xml:space="preserve">${text}</w:t></w:r>`;
}

export function paragraph(...runs: string[]): string {
  return `<w:p>${runs.map(run).join("")}</w:p>`;
}

export function documentXml(...paragraphs: string[]): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<w:document xmlns:w="${W_NS}"><w:body>${paragraphs.join("")}</w:body></w:document>`
  );
}

export interface FixtureOptions {
  /** Raw document.xml; overrides `paragraphs`. */
  xml?: string;
  paragraphs?: string[];
  /** Leave out word/document.xml entirely. */
  omitDocument?: boolean;
  /** Extra members, e.g. a header part or an image. */
  extra?: Record<string, string | Buffer>;
}

export function buildDocx(opts: FixtureOptions): Buffer {
  const zip = new PizZip();
  zip.file("[Content_Types].xml", CONTENT_TYPES_XML);
  zip.file("_rels/.rels", PACKAGE_RELS_XML);
  zip.file("word/_rels/document.xml.rels", DOCUMENT_RELS_XML);
  if (!opts.omitDocument) {
    zip.file("word/document.xml", opts.xml ?? documentXml(...(opts.paragraphs ?? [])));
  }
  for (const [name, content] of Object.entries(opts.extra ?? {})) {
    zip.file(name, content);
  }
  return Buffer.from(zip.generate({ type: "nodebuffer", compression: "DEFLATE" }));
}

export function writeDocx(dir: string, name: string, opts: FixtureOptions): string {
  const full = path.join(dir, name);
  writeFileSync(full, buildDocx(opts));
  return full;
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(path.join(tmpdir(), `${prefix}-`));
}

/** Text content of a DOCX main document with every tag removed. */
export function documentText(docx: Buffer): string {
  const entry = new PizZip(docx).file("word/document.xml");
  if (!entry) throw new Error("word/document.xml missing");
  return entry.asText().replace(/<[^>]+>/g, "");
}

export function readMember(docx: Buffer, name: string): Buffer | null {
  const entry = new PizZip(docx).file(name);
  return entry ? entry.asNodeBuffer() : null;
}
