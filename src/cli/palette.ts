const RESET = '\x1b[0m';

const CODES = {
  bold: '\x1b[1m',
  red: '\x1b[91m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  blue: '\x1b[94m',
  magenta: '\x1b[95m',
  cyan: '\x1b[96m',
  white: '\x1b[97m'
} as const;

export type Color = keyof typeof CODES;

export type Palette = Record<Color, (text: string) => string>;

export function createPalette(enabled: boolean): Palette {
  const paint = (color: Color) => (text: string) => (enabled ? `${CODES[color]}${text}${RESET}` : text);
  return {
    bold: paint('bold'),
    red: paint('red'),
    green: paint('green'),
    yellow: paint('yellow'),
    blue: paint('blue'),
    magenta: paint('magenta'),
    cyan: paint('cyan'),
    white: paint('white')
  };
}

export const plainPalette = createPalette(false);

/** Colors on for a TTY unless NO_COLOR is set. */
export function shouldUseColor(isTTY: boolean | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(isTTY) && (env.NO_COLOR === undefined || env.NO_COLOR === '');
}
