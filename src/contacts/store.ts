/**
 * Contact store — salesperson records kept in a CSV file.
 *
 * The file has a one-row header `Name,Email,Phone` and is created with just
 * that header when missing. Rows without a name are skipped on read.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { createLogger } from "../shared/log.js";

export const CONTACT_HEADER = ["Name", "Email", "Phone"] as const;

const CsvRowSchema = z.object({
  Name: z.string().min(1),
  Email: z.string().optional().default(""),
  Phone: z.string().optional().default(""),
});

export const NewContactSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  email: z.string().trim().optional().default(""),
  phone: z.string().trim().optional().default(""),
});

export interface Contact {
  name: string;
  email: string;
  phone: string;
}

export type ContactField = keyof Contact;

export type NewContact = z.input<typeof NewContactSchema>;

const log = createLogger("contacts");

function escapeCsv(value: string): string {
  const flat = value.replace(/\r?\n/g, " ");
  if (flat.includes('"') || flat.includes(",")) {
    return `"${flat.replace(/"/g, '""')}"`;
  }
  return flat;
}

export class ContactStore {
  constructor(private readonly csvPath: string) {}

  get path(): string {
    return this.csvPath;
  }

  /** Create the CSV with only its header row if it does not exist yet. */
  ensure(): void {
    if (existsSync(this.csvPath)) return;
    mkdirSync(path.dirname(this.csvPath), { recursive: true });
    writeFileSync(this.csvPath, CONTACT_HEADER.join(",") + "\n", "utf-8");
    log.info(`Created contact list ${this.csvPath}`);
  }

  list(): Contact[] {
    this.ensure();
    const rows: unknown[] = parse(readFileSync(this.csvPath, "utf-8"), {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });

    const contacts: Contact[] = [];
    rows.forEach((row, index) => {
      const parsed = CsvRowSchema.safeParse(row);
      if (!parsed.success) {
        log.warn(`Skipping contact row ${index + 2}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        return;
      }
      contacts.push({ name: parsed.data.Name, email: parsed.data.Email, phone: parsed.data.Phone });
    });
    return contacts;
  }

  /** Contact at a zero-based position in {@link list}, if any. */
  get(index: number): Contact | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    return this.list()[index];
  }

  add(input: NewContact): Contact {
    const { name, email, phone } = NewContactSchema.parse(input);
    this.ensure();
    const current = readFileSync(this.csvPath, "utf-8");
    const lead = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
    appendFileSync(
      this.csvPath,
      lead + [name, email, phone].map(escapeCsv).join(",") + "\n",
      "utf-8",
    );
    return { name, email, phone };
  }
}
