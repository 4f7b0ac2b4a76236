/**
 * HTTP routes for template selection, document generation and downloads.
 *
 * Failures respond with `{ error: <notice> }`; internals are logged, never
 * returned.
 */

import { Router } from "express";
import multer from "multer";
import { z } from "zod";

import { NewContactSchema, type ContactStore } from "../contacts/store.js";
import { NOTICES, type DocumentGenerator } from "../generation/pipeline.js";
import { TemplateUploadError } from "../shared/errors.js";
import { createLogger } from "../shared/log.js";

const SelectTemplateSchema = z.object({
  template: z.string().optional(),
});

const GenerateDocumentSchema = z.object({
  template: z.string().optional(),
  values: z.record(z.unknown()).default({}),
  contactIndex: z.coerce.number().int().min(0).optional(),
});

const log = createLogger("api");

export function createRouter(generator: DocumentGenerator, contacts: ContactStore): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage() });

  // ── GET /templates ──────────────────────────────────────────────

  router.get("/templates", (_req, res) => {
    try {
      res.json(generator.listTemplates());
    } catch (err) {
      log.error("Listing templates failed", err);
      res.status(500).json({ error: "Could not list templates." });
    }
  });

  // ── POST /templates ─────────────────────────────────────────────

  router.post("/templates", upload.single("file"), (req, res) => {
    const file = req.file;
    if (!file) return res.status(400).json({ error: "No file uploaded" });
    try {
      const result = generator.templates.ingest(file.buffer, file.originalname);
      res.status(201).json(result);
    } catch (err) {
      if (err instanceof TemplateUploadError) return res.status(400).json({ error: err.message });
      log.error("Storing uploaded template failed", err);
      res.status(500).json({ error: "Could not store the template." });
    }
  });

  // ── POST /templates/select ──────────────────────────────────────

  router.post("/templates/select", (req, res) => {
    const body = SelectTemplateSchema.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: "Invalid request body." });

    const form = generator.prepareForm(body.data.template);
    if (!form.ok) {
      const status = form.notice === NOTICES.unknownTemplate ? 404 : 400;
      return res.status(status).json({ error: form.notice });
    }
    res.json({ template: form.template, fields: form.fields, contactFields: form.contactFields });
  });

  // ── POST /documents ─────────────────────────────────────────────

  router.post("/documents", (req, res) => {
    const body = GenerateDocumentSchema.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: "Invalid request body." });

    const result = generator.generate(body.data);
    if (!result.ok) return res.status(400).json({ error: result.notice });

    res.status(201).json({
      outputFilename: result.outputFilename,
      downloadUrl: `/download/${encodeURIComponent(result.outputFilename)}`,
    });
  });

  // ── GET /download/:filename ─────────────────────────────────────

  router.get("/download/:filename", (req, res) => {
    const full = generator.resolveDownload(req.params.filename);
    if (!full) return res.status(404).json({ error: "File not found." });
    res.download(full, req.params.filename);
  });

  // ── Contacts ────────────────────────────────────────────────────

  router.get("/contacts", (_req, res) => {
    try {
      res.json(contacts.list());
    } catch (err) {
      log.error("Listing contacts failed", err);
      res.status(500).json({ error: "Could not read contacts." });
    }
  });

  router.post("/contacts", (req, res) => {
    const body = NewContactSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ error: body.error.issues[0]?.message ?? "Invalid contact." });
    }
    try {
      res.status(201).json(contacts.add(body.data));
    } catch (err) {
      log.error("Adding contact failed", err);
      res.status(500).json({ error: "Could not save contact." });
    }
  });

  return router;
}
