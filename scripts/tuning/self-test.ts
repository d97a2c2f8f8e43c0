/**
 * Built-in regression check run by `generate-tuning-config --test`.
 *
 * Fixtures are exact expected outputs for a (version, size) pair; the
 * generated config must match both the key set and every formatted value.
 *
 * @module self-test
 */

import { readFileSync } from "node:fs";
import { type } from "arktype";
import { FixtureValidationError, SelfTestMismatchError } from "../utils/errors";
import { toConfigValue } from "../utils/guc-formatter";
import { generateConfig } from "./tuning-generator";
import { parseVersion } from "./tuning-input";
import { KB_PER_MB } from "./types";

export const SelfTestFixtureSchema = type({
  version: "string",
  sizeMb: "number.integer >= 0",
  expected: "Record<string, string>",
});

export const SelfTestFixturesSchema = SelfTestFixtureSchema.array();

export type SelfTestFixture = typeof SelfTestFixtureSchema.infer;

const FIXTURES_URL = new URL("./self-test-fixtures.json", import.meta.url);

/**
 * @throws {FixtureValidationError} If the data is not a valid fixture list
 */
export function validateFixtures(data: unknown): SelfTestFixture[] {
  const result = SelfTestFixturesSchema(data);
  if (result instanceof type.errors) {
    throw new FixtureValidationError(result.summary);
  }
  return result;
}

export function loadFixtures(url: URL = FIXTURES_URL): SelfTestFixture[] {
  const data: unknown = JSON.parse(readFileSync(url, "utf8"));
  return validateFixtures(data);
}

/**
 * Check a single fixture against the generator.
 *
 * @throws {SelfTestMismatchError} On the first missing, unexpected or differing key
 */
export function checkFixture(fixture: SelfTestFixture): void {
  const config = generateConfig({
    version: parseVersion(fixture.version),
    ramKb: fixture.sizeMb * KB_PER_MB,
  });

  const got = new Map(
    Object.entries(config).map(([key, value]): [string, string] => [key, toConfigValue(value)])
  );
  const expected = new Map(Object.entries(fixture.expected));

  for (const key of [...got.keys()].sort()) {
    if (!expected.has(key)) {
      throw new SelfTestMismatchError(fixture, key, got.get(key), undefined);
    }
  }

  for (const [key, value] of [...expected].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (got.get(key) !== value) {
      throw new SelfTestMismatchError(fixture, key, got.get(key), value);
    }
  }
}

/**
 * @returns Number of fixtures checked
 */
export function runSelfTest(fixtures: readonly SelfTestFixture[] = loadFixtures()): number {
  for (const fixture of fixtures) {
    checkFixture(fixture);
  }
  return fixtures.length;
}
