/**
 * Renderer — fills a sanitized template with docxtemplater.
 *
 * Load and render failures surface as `RenderError`, write failures as
 * `SaveError`; callers do not inspect them further.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import PizZip from "pizzip";
import Docxtemplater from "docxtemplater";

import { RenderError, SaveError } from "../shared/errors.js";
import type { RenderContext } from "./render_context.js";

export function renderDocument(sanitizedTemplatePath: string, context: RenderContext): Buffer {
  try {
    const zip = new PizZip(readFileSync(sanitizedTemplatePath));
    const doc = new Docxtemplater(zip, {
      paragraphLoop: true,
      linebreaks: true,
      delimiters: { start: "{{", end: "}}" },
      // Unfilled fields render as blanks
      nullGetter() {
        return "";
      },
    });

    doc.render(context.toTemplateData());

    const buf = doc.getZip().generate({
      type: "nodebuffer",
      compression: "DEFLATE",
    });
    return Buffer.from(buf);
  } catch (err) {
    throw new RenderError(`Failed to render ${path.basename(sanitizedTemplatePath)}`, { cause: err });
  }
}

/** Write the rendered document, replacing any previous file of that name. */
export function saveDocument(docx: Buffer, outputPath: string): void {
  try {
    mkdirSync(path.dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, docx);
  } catch (err) {
    throw new SaveError(`Failed to save ${outputPath}`, { cause: err });
  }
}
