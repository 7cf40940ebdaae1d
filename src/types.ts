// Core geometry, color and border types shared by termscroll views

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Bounds extends Position, Size {}

// Common terminal/ANSI colors
export type TerminalColor =
  | 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white'
  | 'gray' | 'grey' | 'brightBlack' | 'brightRed' | 'brightGreen' | 'brightYellow'
  | 'brightBlue' | 'brightMagenta' | 'brightCyan' | 'brightWhite'
  | (string & {}); // Allow custom colors/hex values

// Border styles using Unicode Box Drawing characters
export type BorderStyle = 'none' | 'thin' | 'thick' | 'double' | 'rounded' | 'ascii';

// Border character definitions: h=horizontal, v=vertical, tl/tr/bl/br=corners, tm/bm/lm/rm/mm=junctions
export interface BorderChars {
  h: string;   // horizontal line
  v: string;   // vertical line
  tl: string;  // top-left corner
  tr: string;  // top-right corner
  bl: string;  // bottom-left corner
  br: string;  // bottom-right corner
  tm: string;  // top-middle junction (┬)
  bm: string;  // bottom-middle junction (┴)
  lm: string;  // left-middle junction (├)
  rm: string;  // right-middle junction (┤)
  mm: string;  // middle-middle junction (┼)
}

export const BORDER_CHARS: Record<Exclude<BorderStyle, 'none'>, BorderChars> = {
  thin: { h: '─', v: '│', tl: '┌', tr: '┐', bl: '└', br: '┘', tm: '┬', bm: '┴', lm: '├', rm: '┤', mm: '┼' },
  thick: { h: '━', v: '┃', tl: '┏', tr: '┓', bl: '┗', br: '┛', tm: '┳', bm: '┻', lm: '┣', rm: '┫', mm: '╋' },
  double: { h: '═', v: '║', tl: '╔', tr: '╗', bl: '╚', br: '╝', tm: '╦', bm: '╩', lm: '╠', rm: '╣', mm: '╬' },
  rounded: { h: '─', v: '│', tl: '╭', tr: '╮', bl: '╰', br: '╯', tm: '┬', bm: '┴', lm: '├', rm: '┤', mm: '┼' },
  ascii: { h: '-', v: '|', tl: '+', tr: '+', bl: '+', br: '+', tm: '+', bm: '+', lm: '+', rm: '+', mm: '+' },
};

/**
 * Border characters for a style, degraded to what the terminal can show.
 * 'basic' terminals have no rounded or thick corners; 'ascii' has no box drawing.
 */
export function getBorderChars(
  style: Exclude<BorderStyle, 'none'>,
  tier: 'full' | 'basic' | 'ascii' = 'full'
): BorderChars {
  if (tier === 'ascii') return BORDER_CHARS.ascii;
  if (tier === 'basic' && (style === 'rounded' || style === 'thick')) return BORDER_CHARS.thin;
  return BORDER_CHARS[style];
}
