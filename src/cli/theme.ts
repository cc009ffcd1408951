const RESET = "\x1b[0m";

const CODES = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  blue: "\x1b[94m",
  cyan: "\x1b[96m",
} as const;

type Paint = (text: string) => string;

/**
 * Terminal styling, fixed at startup and shared by reference.
 */
export interface Theme {
  readonly colors: boolean;
  readonly bold: Paint;
  readonly dim: Paint;
  readonly user: Paint;
  readonly assistant: Paint;
  readonly heading: Paint;
  readonly command: Paint;
  readonly info: Paint;
  readonly success: Paint;
  readonly warning: Paint;
  readonly error: Paint;
}

export function createTheme(options: { colors: boolean }): Theme {
  const paint = (...codes: string[]): Paint =>
    options.colors ? (text) => `${codes.join("")}${text}${RESET}` : (text) => text;

  return Object.freeze({
    colors: options.colors,
    bold: paint(CODES.bold),
    dim: paint(CODES.dim),
    user: paint(CODES.bold, CODES.blue),
    assistant: paint(CODES.bold, CODES.green),
    heading: paint(CODES.bold, CODES.yellow),
    command: paint(CODES.green),
    info: paint(CODES.cyan),
    success: paint(CODES.green),
    warning: paint(CODES.yellow),
    error: paint(CODES.red),
  });
}

export interface ColorSupportInput {
  configEnabled: boolean;
  /** False when --no-color was given. */
  flag: boolean;
  isTTY: boolean;
  env: Record<string, string | undefined>;
}

export function shouldUseColor(input: ColorSupportInput): boolean {
  if (!input.configEnabled || !input.flag) return false;
  const force = (input.env.FORCE_COLOR ?? "").toLowerCase();
  if (force === "1" || force === "true" || force === "yes") return true;
  if (input.env.NO_COLOR) return false;
  if (input.env.TERM === "dumb") return false;
  return input.isTTY;
}
