/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing CLI output. In non-TTY
 * environments the codes pass through; stripAnsi() removes them.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatPercent } from './terminal';
 *
 * write(bold('Topic proficiency'));
 * write(green(formatPercent(0.69)));
 * ```
 */

// =============================================================================
// Text Style Modifiers
// =============================================================================

/** Emphasis for headings and key values. */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Secondary information such as hints, timestamps and IDs. */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/**
 * Removes ANSI escape codes, e.g. for writing to a file or asserting output.
 */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * A dim horizontal line.
 *
 * @example
 * formatSeparator(10); // "──────────" (dim)
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * A [0, 1] value as a percentage with one decimal.
 *
 * @example
 * formatPercent(0.6667); // "66.7%"
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Proficiency colored by band: green from 0.8, yellow from 0.5, red below.
 */
export function formatProficiency(value: number): string {
  const text = formatPercent(value);
  if (value >= 0.8) return green(text);
  if (value >= 0.5) return yellow(text);
  return red(text);
}

/**
 * Calendar date (UTC) of an instant, e.g. "2024-01-21".
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Shortens text to `max` characters with a trailing ellipsis.
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max - 3)}...` : text;
}
