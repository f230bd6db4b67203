// src/config/storage.config.ts

import { type Env, parseBoolEnv, requireEnv } from "../utils/env.js";

export interface StorageOptions {
  key: string;
  secret: string;
  endpoint: string;
  region: string;
  bucket: string;

  // Base URL used to build public file links.
  publicUrl: string;

  forcePathStyle: boolean;
  disableSSL: boolean;
}

function assertEndpoint(name: string, value: string) {
  if (/\s/.test(value)) {
    throw new Error(`${name} must not contain whitespace`);
  }
  if (/^[a-z]+:\/\//i.test(value) && !/^https?:\/\//i.test(value)) {
    throw new Error(`${name} must start with http:// or https://`);
  }
}

export function loadStorageEnv(env: Env = process.env): StorageOptions {
  const endpoint = requireEnv(env, "STORAGE_ENDPOINT");
  assertEndpoint("STORAGE_ENDPOINT", endpoint);

  const publicUrl = (env.STORAGE_URL?.trim() || endpoint).replace(/\/$/, "");
  assertEndpoint("STORAGE_URL", publicUrl);

  return {
    key: requireEnv(env, "STORAGE_KEY"),
    secret: requireEnv(env, "STORAGE_SECRET"),
    endpoint,
    region: requireEnv(env, "STORAGE_REGION"),
    bucket: requireEnv(env, "STORAGE_BUCKET"),
    publicUrl,
    forcePathStyle: parseBoolEnv("STORAGE_FORCE_PATH_STYLE", false, env),
    disableSSL: parseBoolEnv("STORAGE_DISABLE_SSL", false, env),
  };
}
