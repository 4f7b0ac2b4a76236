/**
 * Typed errors raised inside the generation pipeline and template upload.
 *
 * Each pipeline stage catches these at its own boundary and converts them
 * into a user-facing notice. Only `TemplateUploadError` reaches the HTTP layer.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Two or more placeholders sanitize to the same key (or to nothing). */
export class PlaceholderCollisionError extends Error {
  readonly collisions: Array<{ key: string; placeholders: string[] }>;

  constructor(collisions: Array<{ key: string; placeholders: string[] }>) {
    const detail = collisions
      .map((c) => `${c.key || "(empty)"} <- ${c.placeholders.map((p) => `"${p}"`).join(", ")}`)
      .join("; ");
    super(`Placeholder collision: ${detail}`);
    this.name = "PlaceholderCollisionError";
    this.collisions = collisions;
  }
}

export class InvalidContextKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Invalid render context key: "${key}"`);
    this.name = "InvalidContextKeyError";
    this.key = key;
  }
}

/** An uploaded template was refused; the message is safe to show. */
export class TemplateUploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateUploadError";
  }
}

export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

export class SaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SaveError";
  }
}

/** Best-effort message for an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
