/**
 * Colors - ANSI helpers without an external dependency
 */

const wrap = (code: number) => (s: string): string => `\x1b[${code}m${s}\x1b[0m`;

export const colors = {
  red: wrap(31),
  green: wrap(32),
  yellow: wrap(33),
  cyan: wrap(36),
  bold: wrap(1),
};
