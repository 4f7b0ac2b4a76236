/**
 * Placeholder Mapping — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { buildMapping, findCollisions } from "../../src/templates/mapping.js";
import { PlaceholderCollisionError } from "../../src/shared/errors.js";

describe("buildMapping()", () => {
  it("maps each placeholder to its sanitized key", () => {
    const mapping = buildMapping(["Client Company Name", "Proposal date", "Salesperson_Name"]);
    expect([...mapping.entries()]).toEqual([
      ["Client Company Name", "Client_Company_Name"],
      ["Proposal date", "Proposal_date"],
      ["Salesperson_Name", "Salesperson_Name"],
    ]);
  });

  it("rejects placeholders that collide after sanitization", () => {
    let caught: unknown;
    try {
      buildMapping(["Client Name", "Client-Name", "Date"]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PlaceholderCollisionError);
    if (caught instanceof PlaceholderCollisionError) {
      expect(caught.collisions).toEqual([
        { key: "Client_Name", placeholders: ["Client Name", "Client-Name"] },
      ]);
    }
  });

  it("rejects placeholders that sanitize to nothing", () => {
    expect(() => buildMapping(["???", "Name"])).toThrow(PlaceholderCollisionError);
  });
});

describe("findCollisions()", () => {
  it("is empty for a clean template", () => {
    expect(findCollisions(["A", "B c", "B_d"])).toEqual([]);
  });

  it("ignores duplicates of the same placeholder", () => {
    expect(findCollisions(["Name", "Name"])).toEqual([]);
  });

  it("reports empty keys", () => {
    expect(findCollisions(["--", "ok"])).toEqual([{ key: "", placeholders: ["--"] }]);
  });
});
