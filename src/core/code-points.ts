/**
 * Code Point Boundaries
 *
 * Lines are indexed in UTF-16 units, but the screen holds one code point
 * per cell. These helpers keep cuts off the middle of a surrogate pair.
 */

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * True when cutting `text` at `index` would separate a surrogate pair.
 */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  return isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));
}

/**
 * Move a cut forward past a low surrogate.
 */
export function boundaryAtOrAfter(text: string, index: number): number {
  return splitsSurrogatePair(text, index) ? index + 1 : index;
}

/**
 * Move a cut back before a high surrogate.
 */
export function boundaryAtOrBefore(text: string, index: number): number {
  return splitsSurrogatePair(text, index) ? index - 1 : index;
}

/**
 * Number of screen cells `text` takes.
 */
export function cellCount(text: string): number {
  return Array.from(text).length;
}
