#!/usr/bin/env tsx
/**
 * CLI: docgen:template:list
 *
 * Usage: npm run docgen:template:list
 *
 * Lists the templates in TEMPLATES_DIR and the contacts available for
 * injection.
 */

import "dotenv/config";
import { ContactStore } from "../contacts/store.js";
import { DocumentGenerator } from "../generation/pipeline.js";
import { loadConfig } from "../shared/config.js";

function main(): void {
  const config = loadConfig();
  const generator = new DocumentGenerator(config, new ContactStore(config.contactsFile));
  const { templates, contacts } = generator.listTemplates();

  console.log(`  Templates in ${config.templatesDir}: ${templates.length}`);
  console.log();
  for (const t of templates) {
    console.log(`  ${t.name}`);
    console.log(`    Placeholders: ${t.placeholderCount}`);
    console.log(`    SHA-256:      ${t.sha256}`);
    console.log();
  }

  console.log(`  Contacts: ${contacts.length}`);
  contacts.forEach((c, i) => {
    console.log(`    [${i}] ${c.name}${c.email ? ` <${c.email}>` : ""}`);
  });
}

main();
