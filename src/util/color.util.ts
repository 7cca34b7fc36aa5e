/**
 * Depth Colors
 *
 * Maps a tree depth to a terminal color. Ten colors, cycled by depth mod 10,
 * so the same depth always gets the same color.
 */

import pc from 'picocolors';

/** Forced-on palette; whether to color at all is the caller's decision. */
const colors = pc.createColors(true);

export type DepthColor =
  | 'red'
  | 'yellow'
  | 'green'
  | 'cyan'
  | 'blue'
  | 'magenta'
  | 'redBright'
  | 'yellowBright'
  | 'greenBright'
  | 'cyanBright';

export const DEPTH_PALETTE: readonly DepthColor[] = [
  'red',
  'yellow',
  'green',
  'cyan',
  'blue',
  'magenta',
  'redBright',
  'yellowBright',
  'greenBright',
  'cyanBright',
];

export function colorForDepth(depth: number): DepthColor {
  const n = DEPTH_PALETTE.length;
  return DEPTH_PALETTE[((depth % n) + n) % n];
}

/** Wrap `text` in the color for `depth`. */
export function colorize(text: string, depth: number): string {
  return colors[colorForDepth(depth)](text);
}
