/**
 * PostgreSQL GUC (Grand Unified Configuration) Formatter Utilities
 *
 * Converts generated tuning values into the text postgresql.conf expects.
 *
 * @module guc-formatter
 */

import { KB_PER_GB, KB_PER_MB, type ConfigMap, type ConfigValue } from "../tuning/types";
import { UnsupportedValueTypeError } from "./errors";

/**
 * Render a size in kilobytes using the largest unit that divides it evenly.
 * Fractional sizes are truncated toward zero first.
 *
 * @example
 * formatSize(1048576) // "1GB"
 * formatSize(7864) // "7864kB"
 */
export function formatSize(kb: number): string {
  const whole = Math.trunc(kb);
  if (whole % KB_PER_GB === 0) return `${whole / KB_PER_GB}GB`;
  if (whole % KB_PER_MB === 0) return `${whole / KB_PER_MB}MB`;
  return `${whole}kB`;
}

/**
 * Format a configuration value for PostgreSQL
 *
 * @throws {UnsupportedValueTypeError} If the value is neither a finite size nor a literal string
 *
 * @example
 * toConfigValue({ kind: "size", kb: 262144 }) // "256MB"
 * toConfigValue({ kind: "literal", value: "0.7" }) // "0.7"
 */
export function toConfigValue(value: ConfigValue): string {
  switch (value.kind) {
    case "size":
      if (typeof value.kb !== "number" || !Number.isFinite(value.kb)) {
        throw new UnsupportedValueTypeError(value);
      }
      return formatSize(value.kb);
    case "literal":
      if (typeof value.value !== "string") {
        throw new UnsupportedValueTypeError(value);
      }
      return value.value;
    default:
      return unsupported(value);
  }
}

function unsupported(value: never): never {
  throw new UnsupportedValueTypeError(value);
}

/**
 * Format a single setting as a postgresql.conf line
 *
 * @example
 * formatSetting("work_mem", { kind: "size", kb: 5242 }) // "work_mem = 5242kB"
 */
export function formatSetting(key: string, value: ConfigValue): string {
  return `${key} = ${toConfigValue(value)}`;
}

/**
 * Render every setting, sorted by name, one newline-terminated line each
 */
export function renderConfig(config: ConfigMap): string {
  return Object.entries(config)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${formatSetting(key, value)}\n`)
    .join("");
}
