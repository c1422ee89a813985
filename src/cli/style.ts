/**
 * CLI Style System
 *
 * Colors, symbols and message formatters for terminal output.
 *
 * ## NO_COLOR Support
 *
 * Respects the NO_COLOR standard (https://no-color.org/):
 *
 * ```bash
 * NO_COLOR=1 genpassword --list     # plain text
 * FORCE_COLOR=1 genpassword | cat   # colors even when piped
 * ```
 *
 * When NO_COLOR is set all ANSI codes become empty strings and symbols
 * fall back to ASCII.
 *
 * @module
 */

import { env } from "node:process";

/**
 * Priority:
 * 1. NO_COLOR - if set (any value), disable colors
 * 2. FORCE_COLOR - if set, enable colors
 * 3. TTY detection - enable if stderr is a TTY
 */
export function shouldUseColors(): boolean {
  if (env.NO_COLOR !== undefined) return false;
  if (env.FORCE_COLOR !== undefined) return true;
  return process.stderr.isTTY ?? false;
}

export function shouldUseUnicode(): boolean {
  // NO_COLOR often indicates desire for plain text - use ASCII
  if (env.NO_COLOR !== undefined) return false;
  if (env.NO_UNICODE || env.ASCII_ONLY) return false;
  if (env.FORCE_UNICODE) return true;
  if (env.LANG?.includes("UTF-8") || env.LANG?.includes("utf8")) return true;
  if (env.TERM?.includes("256color") || env.TERM?.includes("truecolor")) return true;
  // Default to ASCII on Windows unless in Windows Terminal or VS Code
  if (process.platform === "win32") {
    return env.WT_SESSION !== undefined || env.TERM_PROGRAM === "vscode";
  }
  return true;
}

const _useColors = shouldUseColors();
const _useUnicode = shouldUseUnicode();

const ANSI = _useColors
  ? ({
      reset: "\x1b[0m",
      red: "\x1b[31m",
      green: "\x1b[32m",
      yellow: "\x1b[33m",
      brightBlack: "\x1b[90m",
    } as const)
  : ({
      reset: "",
      red: "",
      green: "",
      yellow: "",
      brightBlack: "",
    } as const);

export const Style = {
  success: ANSI.green,
  warning: ANSI.yellow,
  error: ANSI.red,
  muted: ANSI.brightBlack,
  reset: ANSI.reset,
} as const;

export const Symbols = {
  check: _useUnicode ? "✓" : "[OK]",
  cross: _useUnicode ? "✗" : "[X]",
  warning: _useUnicode ? "⚠" : "[!]",
  approx: _useUnicode ? "≈" : "~",
  times: _useUnicode ? "×" : "x",
} as const;

export function color(text: string, colorCode: string): string {
  return `${colorCode}${text}${Style.reset}`;
}

export function muted(text: string): string {
  return color(text, Style.muted);
}

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

export function visualWidth(text: string): number {
  return stripAnsi(text).length;
}

/** Pad to a visual width, ignoring ANSI codes */
export function padEnd(str: string, width: number, fill = " "): string {
  const strWidth = visualWidth(str);
  if (strWidth >= width) return str;
  return str + fill.repeat(width - strWidth);
}

export const Message = {
  success: (text: string) => color(`${Symbols.check} ${text}`, Style.success),
  error: (text: string) => color(`${Symbols.cross} ${text}`, Style.error),
  warning: (text: string) => color(`${Symbols.warning} ${text}`, Style.warning),
} as const;
