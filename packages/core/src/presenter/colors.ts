const CODES = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  gray: [90, 39],
} as const;

type ColorName = keyof typeof CODES;
type Colorize = (text: string) => string;

let enabled = !process.env.NO_COLOR;

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

export function isColorEnabled(): boolean {
  return enabled && !process.env.NO_COLOR;
}

function paint(name: ColorName): Colorize {
  const [open, close] = CODES[name];
  return (text) => (isColorEnabled() ? `\x1b[${open}m${text}\x1b[${close}m` : text);
}

export const colors: Record<ColorName, Colorize> = {
  bold: paint("bold"),
  dim: paint("dim"),
  red: paint("red"),
  green: paint("green"),
  yellow: paint("yellow"),
  cyan: paint("cyan"),
  gray: paint("gray"),
};

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}
