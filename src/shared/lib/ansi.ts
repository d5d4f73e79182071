/**
 * Tiny ANSI color helper bound to an output stream.
 * Functions pass text through unchanged when NO_COLOR is set or the stream is not a TTY.
 */

export interface Palette {
  bold(s: string): string;
  dim(s: string): string;
  green(s: string): string;
  yellow(s: string): string;
  red(s: string): string;
  grey(s: string): string;
}

export function colorEnabled(stream: { isTTY?: boolean }): boolean {
  return !process.env['NO_COLOR'] && !!stream.isTTY;
}

export function createPalette(enabled: boolean): Palette {
  const wrap = (open: number, close: number) => (s: string): string =>
    enabled ? `\u001b[${open}m${s}\u001b[${close}m` : s;

  return {
    bold: wrap(1, 22),
    dim: wrap(2, 22),
    green: wrap(32, 39),
    yellow: wrap(33, 39),
    red: wrap(31, 39),
    grey: wrap(90, 39),
  };
}
