/**
 * Diagnostic logging for the tuning scripts
 *
 * Everything here writes to stderr so that stdout carries only the generated
 * configuration lines.
 */
import { colorize } from "./colors";

/**
 * Print error message with red ❌ prefix
 */
export function error(msg: string): void {
  console.error(colorize("RED", `❌ ${msg}`));
}

/**
 * Print warning message with yellow ⚠️ prefix
 */
export function warning(msg: string): void {
  console.warn(colorize("YELLOW", `⚠️  ${msg}`));
}
