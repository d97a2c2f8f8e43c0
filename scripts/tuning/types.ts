export const KB_PER_MB = 1024;
export const KB_PER_GB = 1024 * 1024;

/**
 * PostgreSQL version as its numeric components, e.g. [9, 5] or [10]
 */
export type Version = readonly number[];

/**
 * A generated setting: either a memory size in kilobytes, normalized to the
 * largest whole unit when formatted, or a literal passed through verbatim.
 */
export type ConfigValue =
  | { readonly kind: "size"; readonly kb: number }
  | { readonly kind: "literal"; readonly value: string };

/**
 * Generated settings keyed by GUC name
 */
export type ConfigMap = Readonly<Record<string, ConfigValue>>;

export interface TuningInput {
  version: Version;
  /** Memory allotted to the container, in kilobytes */
  ramKb: number;
}

export function size(kb: number): ConfigValue {
  return { kind: "size", kb };
}

export function literal(value: string): ConfigValue {
  return { kind: "literal", value };
}
