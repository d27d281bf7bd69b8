import * as v from "valibot";

import { type Env, envSchema } from "./schema";

/**
 * Raised when process.env does not satisfy the env schema.
 * Each issue is rendered as `PATH: message`.
 */
export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed:\n  - ${issues.join("\n  - ")}`);
    this.name = "EnvValidationError";
  }
}

export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }
  throw new EnvValidationError(
    result.issues.map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`),
  );
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export type { Env } from "./schema";
