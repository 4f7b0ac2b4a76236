/**
 * Generation pipeline — template selection through saved document.
 *
 * Stages:
 *   1. resolve template + extract placeholders   (MissingInput / ExtractionFailure)
 *   2. build mapping                             (collision)
 *   3. build context                             (contact lookup)
 *   4. write sanitized copy                      (RewriteFailure)
 *   5. render                                    (RenderFailure)
 *   6. derive filename + save                    (SaveFailure)
 *
 * Every stage catches its own failure and returns a notice. Nothing is
 * retried; the caller sends the user back to the start.
 *
 * All file I/O here is synchronous, so within one process two requests
 * never interleave on the sanitized copy or the output file.
 */

import { existsSync } from "fs";
import path from "path";

import type { Contact, ContactStore } from "../contacts/store.js";
import type { AppConfig } from "../shared/config.js";
import { PlaceholderCollisionError } from "../shared/errors.js";
import { createLogger } from "../shared/log.js";
import { TemplateCatalog, type TemplateEntry } from "../templates/catalog.js";
import { buildMapping, type PlaceholderMapping } from "../templates/mapping.js";
import { extractPlaceholders, sortPlaceholders } from "../templates/placeholders.js";
import { rewriteTemplate } from "../templates/rewriter.js";
import { buildContext, manualFieldsFor, type ManualField } from "./context_builder.js";
import { deriveOutputFilename } from "./filename.js";
import { renderDocument, saveDocument } from "./renderer.js";

export const NOTICES = {
  noTemplateSelected: "No template selected.",
  templateMissing: "Template file missing.",
  unknownTemplate: "Selected template does not exist.",
  noPlaceholdersSelected: "No placeholders found in the selected template.",
  noPlaceholders: "No placeholders found in the template.",
  unknownContact: "Selected contact does not exist.",
  sanitizeFailed: "Error sanitizing the template.",
  renderFailed: "Error rendering the document.",
  saveFailed: "Error saving the generated document.",
} as const;

export type FailureStage = "input" | "collision" | "rewrite" | "render" | "save";

export interface Failure {
  ok: false;
  stage: FailureStage;
  notice: string;
}

export interface PreparedForm {
  ok: true;
  template: string;
  fields: ManualField[];
  /** Placeholders filled from the selected contact. */
  contactFields: string[];
}

export interface GeneratedDocument {
  ok: true;
  outputFilename: string;
  outputPath: string;
  placeholders: string[];
}

export interface GenerateRequest {
  template?: string;
  /** Form values keyed by sanitized key. */
  values: Readonly<Record<string, unknown>>;
  contactIndex?: number;
}

export interface TemplateListing {
  templates: TemplateEntry[];
  contacts: Contact[];
}

const log = createLogger("pipeline");

function fail(stage: FailureStage, notice: string): Failure {
  return { ok: false, stage, notice };
}

function collisionNotice(err: PlaceholderCollisionError): string {
  const groups = err.collisions.map((c) => c.placeholders.map((p) => `"${p}"`).join(" / "));
  return `Template placeholders collide after sanitization: ${groups.join("; ")}`;
}

export class DocumentGenerator {
  private readonly catalog: TemplateCatalog;

  constructor(
    private readonly config: AppConfig,
    private readonly contacts: ContactStore,
  ) {
    this.catalog = new TemplateCatalog(config.templatesDir);
  }

  get templates(): TemplateCatalog {
    return this.catalog;
  }

  private get excluded(): ReadonlySet<string> {
    return new Set(this.config.contactBindings.keys());
  }

  listTemplates(): TemplateListing {
    return { templates: this.catalog.list(), contacts: this.contacts.list() };
  }

  prepareForm(template: string | undefined): PreparedForm | Failure {
    if (!template) return fail("input", NOTICES.noTemplateSelected);
    const templatePath = this.catalog.resolve(template);
    if (!templatePath) return fail("input", NOTICES.unknownTemplate);

    const placeholders = sortPlaceholders(extractPlaceholders(templatePath));
    if (placeholders.length === 0) return fail("input", NOTICES.noPlaceholdersSelected);

    try {
      buildMapping(placeholders);
    } catch (err) {
      if (err instanceof PlaceholderCollisionError) return fail("collision", collisionNotice(err));
      throw err;
    }

    return {
      ok: true,
      template,
      fields: manualFieldsFor(placeholders, this.excluded),
      contactFields: placeholders.filter((p) => this.excluded.has(p)),
    };
  }

  generate(request: GenerateRequest): GeneratedDocument | Failure {
    if (!request.template) return fail("input", NOTICES.templateMissing);
    const templatePath = this.catalog.resolve(request.template);
    if (!templatePath) return fail("input", NOTICES.unknownTemplate);

    // Re-extract in case the template changed since the form was shown.
    const placeholders = sortPlaceholders(extractPlaceholders(templatePath));
    if (placeholders.length === 0) return fail("input", NOTICES.noPlaceholders);

    let mapping: PlaceholderMapping;
    try {
      mapping = buildMapping(placeholders);
    } catch (err) {
      if (err instanceof PlaceholderCollisionError) {
        log.warn(err.message);
        return fail("collision", collisionNotice(err));
      }
      throw err;
    }

    let contact: Contact | undefined;
    if (request.contactIndex !== undefined) {
      contact = this.contacts.get(request.contactIndex);
      if (!contact) return fail("input", NOTICES.unknownContact);
    }

    const { rawValues, context } = buildContext({
      placeholders,
      excluded: this.excluded,
      formValues: request.values,
      contact,
      contactBindings: this.config.contactBindings,
    });

    const sanitizedPath = rewriteTemplate(templatePath, mapping, this.config.sanitizedDir);
    if (!sanitizedPath) return fail("rewrite", NOTICES.sanitizeFailed);

    let docx: Buffer;
    try {
      docx = renderDocument(sanitizedPath, context);
    } catch (err) {
      log.error(`Rendering ${request.template} failed`, err instanceof Error ? err.cause ?? err : err);
      return fail("render", NOTICES.renderFailed);
    }

    const outputFilename = deriveOutputFilename(rawValues, this.config.filename);
    const outputPath = path.join(this.config.outputDir, outputFilename);
    try {
      saveDocument(docx, outputPath);
    } catch (err) {
      log.error(`Saving ${outputFilename} failed`, err instanceof Error ? err.cause ?? err : err);
      return fail("save", NOTICES.saveFailed);
    }

    log.info(`Generated ${outputFilename} from ${request.template}`);
    return { ok: true, outputFilename, outputPath, placeholders };
  }

  /** Path of a generated file, or `null` for anything but an existing basename. */
  resolveDownload(filename: string): string | null {
    if (!filename || path.basename(filename) !== filename || filename.startsWith(".")) return null;
    const full = path.join(this.config.outputDir, filename);
    return existsSync(full) ? full : null;
  }
}
