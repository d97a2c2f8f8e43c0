#!/usr/bin/env tsx

/**
 * Generate PostgreSQL memory tuning settings for the current container
 *
 * Usage:
 *   PG_VERSION=9.6 APTIBLE_CONTAINER_SIZE=2048 tsx scripts/generate-tuning-config.ts
 *   tsx scripts/generate-tuning-config.ts --test
 *
 * Environment:
 *   PG_VERSION              PostgreSQL version, e.g. 9.5 or 10 (required)
 *   APTIBLE_CONTAINER_SIZE  Container memory in MB (default: 1024)
 *
 * Exit codes:
 *   0 - Success (also for unrecognized arguments, after printing usage)
 *   1 - Missing or malformed input, or a self-test mismatch
 */

import { runCli } from "./tuning/cli";

process.exitCode = runCli(process.argv.slice(2), process.env);
