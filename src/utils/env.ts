// src/utils/env.ts

export type Env = Record<string, string | undefined>;

export function requireEnv(env: Env, name: string): string {
  const raw = env[name]?.trim();
  if (!raw) {
    throw new Error(`Missing required env: ${name}`);
  }
  return raw;
}

export function parsePositiveIntEnv(
  name: string,
  fallback: number,
  env: Env = process.env,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseNonNegativeIntEnv(
  name: string,
  fallback: number,
  env: Env = process.env
): number {
  return parsePositiveIntEnv(name, fallback, env, 0);
}

export function parseBoolEnv(
  name: string,
  fallback: boolean,
  env: Env = process.env
): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new Error(`${name} must be a boolean (true/false/1/0)`);
}
