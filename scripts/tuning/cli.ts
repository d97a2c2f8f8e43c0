/**
 * Command-line glue for the tuning generator
 *
 * Reads the version and container size from the environment, prints the
 * generated settings to stdout sorted by name, or runs the fixture battery
 * with --test.
 */

import { formatError } from "../utils/errors";
import { error, warning } from "../utils/logger";
import { renderConfig } from "../utils/guc-formatter";
import { generateConfig } from "./tuning-generator";
import { readTuningInput } from "./tuning-input";
import { runSelfTest, type SelfTestFixture } from "./self-test";

export const PROGRAM = "generate-tuning-config";
export const USAGE = `Usage: ${PROGRAM} [--test]`;

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Run the CLI and return the process exit code
 * @param fixtures - Fixture battery for --test (default: the bundled fixtures file)
 */
export function runCli(
  args: readonly string[],
  env: Env,
  fixtures?: readonly SelfTestFixture[]
): number {
  if (args.length === 0) {
    return printConfig(env);
  }

  if (args.length === 1) {
    switch (args[0]) {
      case "--test":
        return selfTest(fixtures);
      case "--help":
      case "-h":
        console.error(USAGE);
        return 0;
    }
  }

  warning(USAGE);
  return 0;
}

function printConfig(env: Env): number {
  try {
    const config = generateConfig(readTuningInput(env));
    process.stdout.write(renderConfig(config));
    return 0;
  } catch (err) {
    error(formatError(err, "Failed to generate tuning config"));
    return 1;
  }
}

function selfTest(fixtures: readonly SelfTestFixture[] | undefined): number {
  try {
    runSelfTest(fixtures);
    console.error("OK");
    return 0;
  } catch (err) {
    error(formatError(err, "Self-test failed"));
    return 1;
  }
}
