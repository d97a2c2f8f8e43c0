/**
 * ANSI color codes for terminal output
 */

export const COLORS = {
  RED: "\x1b[31m",
  YELLOW: "\x1b[33m",
  RESET: "\x1b[0m",
} as const;

export type Color = Exclude<keyof typeof COLORS, "RESET">;

/**
 * Wrap a message in the given color, resetting afterwards
 */
export function colorize(color: Color, msg: string): string {
  return `${COLORS[color]}${msg}${COLORS.RESET}`;
}
