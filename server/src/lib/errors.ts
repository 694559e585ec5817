import { z } from "zod";

export class InvalidInputError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ConfigurationError extends Error {
  readonly statusCode = 500;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof z.ZodError) {
    const fields = err.issues.map((issue) => issue.path.join(".") || "(root)");
    return `unexpected response shape (${Array.from(new Set(fields)).join(", ")})`;
  }
  if (err instanceof Error) {
    const label = "code" in err && typeof err.code === "string" ? `${err.name} ${err.code}` : err.name;
    return `${label}: ${err.message}`;
  }
  return String(err);
}
