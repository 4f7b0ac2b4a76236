/**
 * Document Renderer — Unit Tests
 *
 * Tests:
 *   - renderDocument() substitutes values and blanks absent keys
 *   - renderDocument() wraps template and load errors in RenderError
 *   - saveDocument() overwrites, and wraps write errors in SaveError
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import path from "path";

import { renderDocument, saveDocument } from "../../src/generation/renderer.js";
import { ABSENT, fieldValue, RenderContext } from "../../src/generation/render_context.js";
import { RenderError, SaveError } from "../../src/shared/errors.js";
import { documentText, makeTempDir, paragraph, writeDocx } from "../helpers/docx_fixture.js";

describe("renderDocument()", () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir("renderer");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("substitutes context values", () => {
    const template = writeDocx(dir, "sanitized_A Template.docx", {
      paragraphs: [paragraph("Client: {{Client_Company_Name}}"), paragraph("Rep: {{Salesperson_Name}}")],
    });
    const ctx = new RenderContext()
      .set("Client_Company_Name", fieldValue("Acme & Sons"))
      .set("Salesperson_Name", fieldValue("Jo"));

    const text = documentText(renderDocument(template, ctx));
    expect(text).toBe("Client: Acme &amp; SonsRep: Jo");
  });

  it("renders absent and unknown keys as blanks", () => {
    const template = writeDocx(dir, "sanitized_B Template.docx", {
      paragraphs: [paragraph("[{{Proposal_date}}][{{Salesperson_Name}}]")],
    });
    const ctx = new RenderContext().set("Proposal_date", ABSENT);
    expect(documentText(renderDocument(template, ctx))).toBe("[][]");
  });

  it("wraps template errors in RenderError", () => {
    const template = writeDocx(dir, "sanitized_C Template.docx", {
      paragraphs: [paragraph("{{#open_loop}} never closed")],
    });
    expect(() => renderDocument(template, new RenderContext())).toThrow(RenderError);
  });

  it("wraps a missing file in RenderError", () => {
    expect(() => renderDocument(path.join(dir, "nope.docx"), new RenderContext())).toThrow(
      RenderError,
    );
  });
});

describe("saveDocument()", () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir("save");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes and overwrites the output file", () => {
    const out = path.join(dir, "output", "Proposal_Acme_2024.docx");
    saveDocument(Buffer.from("first"), out);
    saveDocument(Buffer.from("second"), out);
    expect(readFileSync(out, "utf-8")).toBe("second");
  });

  it("wraps write failures in SaveError", () => {
    const blocker = path.join(dir, "blocker");
    writeFileSync(blocker, "a file, not a directory");
    expect(() => saveDocument(Buffer.from("x"), path.join(blocker, "out.docx"))).toThrow(SaveError);
    expect(existsSync(path.join(blocker, "out.docx"))).toBe(false);
  });
});
