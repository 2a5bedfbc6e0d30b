/**
 * ANSI color helpers for text output.
 * Colors apply only when enabled (interactive terminal, no --no-color).
 */

const RESET = '\x1b[0m';

const CODES = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
} as const;

type ColorFn = (text: string) => string;

type Colors = Record<keyof typeof CODES, ColorFn>;

function createColors(enabled: boolean): Colors {
  const wrap = (code: string): ColorFn => (enabled ? text => `${code}${text}${RESET}` : text => text);
  return {
    red: wrap(CODES.red),
    yellow: wrap(CODES.yellow),
    green: wrap(CODES.green),
    cyan: wrap(CODES.cyan),
    gray: wrap(CODES.gray),
    bold: wrap(CODES.bold),
  };
}

export { createColors, type Colors };
