/**
 * Parses the tuning inputs from environment variables using ArkType.
 *
 * @module tuning-input
 */

import { type } from "arktype";
import { MalformedSizeError, MalformedVersionError, MissingVersionError } from "../utils/errors";
import { KB_PER_MB, type TuningInput, type Version } from "./types";

export const VERSION_ENV = "PG_VERSION";
export const SIZE_ENV = "APTIBLE_CONTAINER_SIZE";
export const DEFAULT_SIZE_MB = "1024";

/**
 * Largest size whose effective_cache_size product (kB * 3) stays an exact
 * integer in a double
 */
export const MAX_SIZE_MB = Math.floor(Number.MAX_SAFE_INTEGER / (KB_PER_MB * 3));

/**
 * Dot-separated non-negative integers: "9.5", "10", "9.6.24"
 */
export const VersionStringSchema = type("/^\\d+(\\.\\d+)*$/");

/**
 * Whole number of megabytes
 */
export const SizeStringSchema = type("/^\\d+$/");

/**
 * @throws {MalformedVersionError} If any component is not an integer
 *
 * @example
 * parseVersion("9.5") // [9, 5]
 */
export function parseVersion(raw: string): Version {
  const result = VersionStringSchema(raw.trim());
  if (result instanceof type.errors) {
    throw new MalformedVersionError(raw, result.summary);
  }
  return result.split(".").map(Number);
}

/**
 * @throws {MalformedSizeError} If the size is not a whole number or exceeds MAX_SIZE_MB
 */
export function parseContainerSizeMb(raw: string): number {
  const result = SizeStringSchema(raw.trim());
  if (result instanceof type.errors) {
    throw new MalformedSizeError(raw, result.summary);
  }
  const sizeMb = Number(result);
  if (sizeMb > MAX_SIZE_MB) {
    throw new MalformedSizeError(raw, `must be at most ${MAX_SIZE_MB}`);
  }
  return sizeMb;
}

/**
 * Build the generator input from an environment record.
 * PG_VERSION is required; APTIBLE_CONTAINER_SIZE defaults to 1024 MB.
 *
 * @throws {MissingVersionError} If PG_VERSION is not set
 */
export function readTuningInput(env: Readonly<Record<string, string | undefined>>): TuningInput {
  const rawVersion = env[VERSION_ENV];
  if (rawVersion === undefined) {
    throw new MissingVersionError(VERSION_ENV);
  }

  const version = parseVersion(rawVersion);
  const sizeMb = parseContainerSizeMb(env[SIZE_ENV] ?? DEFAULT_SIZE_MB);

  return { version, ramKb: sizeMb * KB_PER_MB };
}
