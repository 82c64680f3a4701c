export type StyleFn = (text: string) => string;

const ESC = '\u001b[';

const colorEnabled = (): boolean => !process.env.NO_COLOR && process.env.TERM !== 'dumb';

const ansi =
  (open: number, close: number): StyleFn =>
  (text) =>
    colorEnabled() ? `${ESC}${open}m${text}${ESC}${close}m` : text;

export const colors = {
  bold: ansi(1, 22),
  dim: ansi(2, 22),
  red: ansi(31, 39),
  green: ansi(32, 39),
  yellow: ansi(33, 39),
  cyan: ansi(36, 39),
};

export const compose =
  (...styles: StyleFn[]): StyleFn =>
  (text) =>
    styles.reduce((styled, style) => style(styled), text);
