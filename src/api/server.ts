import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import express from "express";

import { ContactStore } from "../contacts/store.js";
import { DocumentGenerator } from "../generation/pipeline.js";
import { ensureDirectories, loadConfig, type AppConfig } from "../shared/config.js";
import { createLogger } from "../shared/log.js";
import { createRouter } from "./routes.js";

const log = createLogger("server");

export function createApp(config: AppConfig) {
  ensureDirectories(config);
  const contacts = new ContactStore(config.contactsFile);
  contacts.ensure();
  const generator = new DocumentGenerator(config, contacts);

  const app = express();
  app.use(express.json());
  app.use(createRouter(generator, contacts));
  return app;
}

export function startServer(config: AppConfig = loadConfig()) {
  const app = createApp(config);
  return app.listen(config.port, () => {
    log.info(`Document generator running on port ${config.port}`);
    log.info(`Templates: ${config.templatesDir}`);
  });
}

// Start if run directly
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  startServer();
}
