/**
 * Terminal Colors
 *
 * ANSI codes for the console logger and startup display. Honors NO_COLOR
 * and can be switched off for tests and non-TTY sinks.
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = Exclude<keyof typeof colors, 'reset'>;

let enabled = process.env['NO_COLOR'] === undefined;

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

export function isColorEnabled(): boolean {
  return enabled;
}

/**
 * Wrap text in a color. Plain text when colors are off.
 */
export function colorize(text: string, color: ColorName): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

type Paint = (text: string) => string;

const paint =
  (color: ColorName): Paint =>
  (text) =>
    colorize(text, color);

export const c = {
  dim: paint('dim'),
  red: paint('red'),
  yellow: paint('yellow'),
  blue: paint('blue'),
  magenta: paint('magenta'),
  cyan: paint('cyan'),
  white: paint('white'),
  brightGreen: paint('brightGreen'),
  brightCyan: paint('brightCyan'),

  success: paint('brightGreen'),
  warning: paint('brightYellow'),
  error: paint('brightRed'),
  info: paint('brightCyan')
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// Domain palettes
// ═══════════════════════════════════════════════════════════════════════════════

const SCOPE_COLORS: Readonly<Record<string, ColorName>> = {
  micro: 'green',
  macro: 'yellow',
  overview: 'magenta'
};

const METHOD_COLORS: Readonly<Record<string, ColorName>> = {
  GET: 'brightGreen',
  POST: 'brightYellow',
  DELETE: 'brightRed'
};

/** Query scopes, narrow to wide: green, yellow, magenta */
export function scopeColor(scope: string): Paint {
  return paint(SCOPE_COLORS[scope] ?? 'cyan');
}

export function methodColor(method: string): Paint {
  return paint(METHOD_COLORS[method] ?? 'white');
}
