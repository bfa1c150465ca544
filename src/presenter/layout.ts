import stringWidth from 'string-width';
import stripAnsi from 'strip-ansi';

export type Cell = {
  /** Undecorated text; widths are measured on this. */
  plain: string;
  /** What actually gets printed. May carry ANSI escapes. */
  styled: string;
};

export const cell = (plain: string, styled: string = plain): Cell => ({ plain, styled });

/** Pads to a terminal column width, counting wide characters as two columns. */
export function padEndWidth(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

/**
 * Splits banner art into cells. Escape sequences the art carries itself stay
 * in `styled` only; `plain` is what the terminal would show.
 */
export function bannerLines(banner: string): Cell[] {
  const lines = banner
    .replace(/\t/g, '  ')
    .split(/\r?\n/)
    .map((line) => cell(stripAnsi(line), line));
  while (lines.length > 0 && !lines[lines.length - 1]?.plain.trim()) {
    lines.pop();
  }
  return lines;
}

/**
 * Joins the banner column and the fact column row by row. Returns exactly
 * max(left.length, right.length) rows; the shorter side is padded with
 * blank cells.
 */
export function sideBySide(left: Cell[], right: Cell[], gap: number): string[] {
  if (left.length === 0) return right.map((row) => row.styled.trimEnd());

  const width = Math.max(...left.map((row) => stringWidth(row.plain)));
  const rows = Math.max(left.length, right.length);
  const out: string[] = [];
  for (let i = 0; i < rows; i += 1) {
    const banner = left[i] ?? cell('');
    const fact = right[i] ?? cell('');
    const padding = ' '.repeat(width - stringWidth(banner.plain));
    const line = fact.plain
      ? `${banner.styled}${padding}${' '.repeat(gap)}${fact.styled}`
      : `${banner.styled}${padding}`;
    out.push(line.trimEnd());
  }
  return out;
}
