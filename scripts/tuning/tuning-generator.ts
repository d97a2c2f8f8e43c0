/**
 * PostgreSQL memory tuning calculations
 *
 * Derives postgresql.conf settings from the engine version and the memory
 * allotted to the container. Sizes are kilobytes throughout; every division
 * truncates, and the formulas keep their written order so that results match
 * the reference outputs exactly.
 *
 * @module tuning-generator
 */

import {
  KB_PER_GB,
  KB_PER_MB,
  literal,
  size,
  type ConfigMap,
  type ConfigValue,
  type TuningInput,
  type Version,
} from "./types";

/** Assumed concurrent client connections when budgeting work_mem */
export const CONNECTIONS = 50;

/** First version with min_wal_size/max_wal_size instead of checkpoint_segments */
export const WAL_SIZE_VERSION: Version = [9, 5];

const MAINTENANCE_WORK_MEM_CAP_KB = 2 * KB_PER_GB;
const WAL_BUFFERS_CAP_KB = 16 * KB_PER_MB;

/**
 * Compare two versions component by component. A version that is a prefix of
 * the other sorts first, so [9] < [9, 5].
 *
 * @returns -1, 0 or 1
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    if (left !== right) return left < right ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

function div(dividend: number, divisor: number): number {
  return Math.trunc(dividend / divisor);
}

/**
 * Generate tuning settings for the given version and memory size.
 *
 * @example
 * generateConfig({ version: [10], ramKb: 4 * KB_PER_GB }).shared_buffers
 * // { kind: "size", kb: 1048576 }  (formats as "1GB")
 */
export function generateConfig({ version, ramKb }: TuningInput): ConfigMap {
  const effectiveCacheKb = div(ramKb * 3, 4);

  const config: Record<string, ConfigValue> = {
    shared_buffers: size(div(ramKb, 4)),
    effective_cache_size: size(effectiveCacheKb),
    maintenance_work_mem: size(Math.min(div(ramKb, 16), MAINTENANCE_WORK_MEM_CAP_KB)),
    work_mem: size(div(effectiveCacheKb, CONNECTIONS * 3)),
    wal_buffers: size(Math.min(div(effectiveCacheKb, 100), WAL_BUFFERS_CAP_KB)),
    checkpoint_completion_target: literal("0.7"),
    default_statistics_target: literal("100"),
  };

  if (compareVersions(version, WAL_SIZE_VERSION) < 0) {
    config.checkpoint_segments = literal("32");
  } else {
    config.min_wal_size = size(1 * KB_PER_GB);
    config.max_wal_size = size(2 * KB_PER_GB);
  }

  return config;
}
