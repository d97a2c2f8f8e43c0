import { describe, test, expect } from "vitest";
import { compareVersions, generateConfig } from "./tuning-generator";
import { KB_PER_GB, KB_PER_MB, type ConfigValue } from "./types";

function sizeOf(value: ConfigValue | undefined): number {
  if (value?.kind !== "size") throw new Error(`expected a size, got ${JSON.stringify(value)}`);
  return value.kb;
}

describe("compareVersions", () => {
  test("orders versions component by component", () => {
    expect(compareVersions([9, 4], [9, 5])).toBe(-1);
    expect(compareVersions([9, 5], [9, 5])).toBe(0);
    expect(compareVersions([9, 6], [9, 5])).toBe(1);
    expect(compareVersions([10], [9, 5])).toBe(1);
    expect(compareVersions([9, 10], [9, 5])).toBe(1);
  });

  test("treats a prefix as the smaller version", () => {
    expect(compareVersions([9], [9, 5])).toBe(-1);
    expect(compareVersions([9, 5, 0], [9, 5])).toBe(1);
  });
});

describe("generateConfig", () => {
  test("9.4 with 1GB uses checkpoint_segments", () => {
    const config = generateConfig({ version: [9, 4], ramKb: KB_PER_GB });

    expect(config).toEqual({
      shared_buffers: { kind: "size", kb: 262144 },
      effective_cache_size: { kind: "size", kb: 786432 },
      maintenance_work_mem: { kind: "size", kb: 65536 },
      work_mem: { kind: "size", kb: 5242 },
      wal_buffers: { kind: "size", kb: 7864 },
      checkpoint_completion_target: { kind: "literal", value: "0.7" },
      default_statistics_target: { kind: "literal", value: "100" },
      checkpoint_segments: { kind: "literal", value: "32" },
    });
  });

  test("10 with 4GB uses min/max_wal_size and caps wal_buffers", () => {
    const config = generateConfig({ version: [10], ramKb: 4 * KB_PER_GB });

    expect(config.min_wal_size).toEqual({ kind: "size", kb: KB_PER_GB });
    expect(config.max_wal_size).toEqual({ kind: "size", kb: 2 * KB_PER_GB });
    expect(config.wal_buffers).toEqual({ kind: "size", kb: 16 * KB_PER_MB });
    expect(config.shared_buffers).toEqual({ kind: "size", kb: KB_PER_GB });
    expect(config).not.toHaveProperty("checkpoint_segments");
  });

  test.each([
    [[9, 5], true],
    [[9, 6], true],
    [[10], true],
    [[9, 4], false],
    [[9], false],
    [[8, 4, 22], false],
  ] as const)("version %j emits wal size settings: %s", (version, modern) => {
    const config = generateConfig({ version, ramKb: KB_PER_GB });
    const keys = Object.keys(config);

    expect(keys.includes("min_wal_size")).toBe(modern);
    expect(keys.includes("max_wal_size")).toBe(modern);
    expect(keys.includes("checkpoint_segments")).toBe(!modern);
  });

  test.each([0, 1, 3, 1023, 1025, 7777, KB_PER_GB + 3, 123456789])(
    "shared_buffers and effective_cache_size truncate for %i kB",
    (ramKb) => {
      const config = generateConfig({ version: [10], ramKb });

      expect(sizeOf(config.shared_buffers)).toBe(Math.floor(ramKb / 4));
      expect(sizeOf(config.effective_cache_size)).toBe(Math.floor((ramKb * 3) / 4));
    }
  );

  test("work_mem and wal_buffers divide the truncated effective cache", () => {
    // 1025 * 3 / 4 = 768.75 -> 768; 768 / 150 -> 5; 768 / 100 -> 7
    const config = generateConfig({ version: [10], ramKb: 1025 });

    expect(sizeOf(config.work_mem)).toBe(5);
    expect(sizeOf(config.wal_buffers)).toBe(7);
  });

  test("zero memory yields zero sizes", () => {
    const config = generateConfig({ version: [9, 4], ramKb: 0 });

    for (const key of ["shared_buffers", "effective_cache_size", "maintenance_work_mem", "work_mem", "wal_buffers"]) {
      expect(sizeOf(config[key])).toBe(0);
    }
  });

  test("maintenance_work_mem caps at 2GB", () => {
    expect(sizeOf(generateConfig({ version: [10], ramKb: 32 * KB_PER_GB }).maintenance_work_mem)).toBe(
      2 * KB_PER_GB
    );
    expect(sizeOf(generateConfig({ version: [10], ramKb: 1024 * KB_PER_GB }).maintenance_work_mem)).toBe(
      2 * KB_PER_GB
    );
    // just below the cap
    expect(sizeOf(generateConfig({ version: [10], ramKb: 16 * KB_PER_GB }).maintenance_work_mem)).toBe(
      KB_PER_GB
    );
  });

  test("wal_buffers caps at 16MB", () => {
    expect(sizeOf(generateConfig({ version: [10], ramKb: 512 * KB_PER_GB }).wal_buffers)).toBe(16 * KB_PER_MB);
  });

  test("is deterministic", () => {
    const input = { version: [9, 6], ramKb: 3 * KB_PER_GB };
    expect(generateConfig(input)).toEqual(generateConfig(input));
  });
});
