/**
 * Line Wrapper
 *
 * Hard, position-based wrapping: `width` UTF-16 units per segment, no
 * word boundaries. A surrogate pair on the cut stays whole, so a segment
 * may run one unit long. Display width of wide characters is not taken
 * into account here.
 */

import { boundaryAtOrAfter } from './code-points.ts';

/**
 * Split a logical line into display segments.
 * An empty line still yields one (empty) segment.
 */
export function wrapLine(line: string, width: number): string[] {
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`Wrap width must be a positive integer, got ${width}`);
  }
  if (line.length === 0) return [''];

  const segments: string[] = [];
  let start = 0;
  while (start < line.length) {
    const end = boundaryAtOrAfter(line, Math.min(start + width, line.length));
    segments.push(line.slice(start, end));
    start = end;
  }
  return segments;
}
