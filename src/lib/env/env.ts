import * as v from "valibot";
import { type Env, envSchema } from "./schema";

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "EnvValidationError";
  }
}

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    throw new EnvValidationError(
      result.issues.map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`),
    );
  }
  return result.output;
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

/** Drops the cached environment so the next `getEnv()` re-reads `process.env`. */
export const resetEnvCache = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
