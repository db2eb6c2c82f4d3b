import type { ZodError } from "zod";

/**
 * Raised for caller mistakes: unknown buckets or story tags, malformed
 * configuration, invalid position input. Data-quality problems never use it.
 */
export class ConfigurationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export function configurationErrorFromZod(
  context: string,
  error: ZodError
): ConfigurationError {
  const details = error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return new ConfigurationError(`Invalid ${context}`, details);
}

export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${String(value)}`);
}
