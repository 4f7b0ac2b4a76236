/**
 * Identifier Sanitizer — Unit Tests
 *
 * Tests:
 *   - sanitizePlaceholder() collapses runs, trims underscores, keeps Unicode letters
 *   - sanitizePlaceholder() is idempotent
 *   - toSanitizedKey() accepts only identifier-safe names
 */

import { describe, it, expect } from "vitest";
import {
  isSanitizedKey,
  sanitizePlaceholder,
  toSanitizedKey,
} from "../../src/templates/identifier.js";
import { InvalidContextKeyError } from "../../src/shared/errors.js";

describe("sanitizePlaceholder()", () => {
  it("replaces runs of non-identifier characters with one underscore", () => {
    expect(sanitizePlaceholder("Client Company Name")).toBe("Client_Company_Name");
    expect(sanitizePlaceholder("Price (USD) - net")).toBe("Price_USD_net");
  });

  it("trims underscores from both ends", () => {
    expect(sanitizePlaceholder("  Proposal date: ")).toBe("Proposal_date");
    expect(sanitizePlaceholder("__internal__")).toBe("internal");
  });

  it("keeps existing inner underscores", () => {
    expect(sanitizePlaceholder("Salesperson_Name")).toBe("Salesperson_Name");
    expect(sanitizePlaceholder("a _b")).toBe("a__b");
  });

  it("keeps non-ASCII letters", () => {
    expect(sanitizePlaceholder("Société name")).toBe("Société_name");
  });

  it("is idempotent", () => {
    const inputs = ["Client Company Name", "  x--y  ", "a _b", "$$$", "Proposal date:", "é è"];
    for (const s of inputs) {
      const once = sanitizePlaceholder(s);
      expect(sanitizePlaceholder(once)).toBe(once);
    }
  });

  it("never yields edge underscores, and is non-empty when input has an alphanumeric", () => {
    for (const s of ["_a_", " 1 ", "--x--", "?z?"]) {
      const key = sanitizePlaceholder(s);
      expect(key).not.toMatch(/^_|_$/);
      expect(key.length).toBeGreaterThan(0);
    }
  });

  it("returns empty string for input without letters or digits", () => {
    expect(sanitizePlaceholder("!!! ---")).toBe("");
  });
});

describe("toSanitizedKey()", () => {
  it("accepts identifier-safe names", () => {
    expect(toSanitizedKey("Salesperson_Name")).toBe("Salesperson_Name");
    expect(isSanitizedKey("x")).toBe(true);
  });

  it("rejects unsafe names", () => {
    expect(() => toSanitizedKey("Client Name")).toThrow(InvalidContextKeyError);
    expect(() => toSanitizedKey("")).toThrow(InvalidContextKeyError);
    expect(isSanitizedKey("_lead")).toBe(false);
    expect(isSanitizedKey("trail_")).toBe(false);
  });
});
