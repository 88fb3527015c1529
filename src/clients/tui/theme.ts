/**
 * Theme
 *
 * Cell styles for each part of the frame and each highlight class.
 * Basic terminal colors only, on the terminal's default background.
 */

import type { Span, StyleClass } from '../../features/syntax/types.ts';
import type { CellStyle } from './types.ts';

export interface Theme {
  normal: CellStyle;
  syntax: Record<StyleClass, CellStyle>;
  lineNumber: CellStyle;
  tabBar: CellStyle;
  tabCurrent: CellStyle;
  status: CellStyle;
  help: CellStyle;
  /** Applied on top of the syntax style of selected rows */
  selection: CellStyle;
}

export const DEFAULT_THEME: Theme = {
  normal: { fg: 'white', bg: 'default' },
  syntax: {
    normal: { fg: 'white', bg: 'default' },
    keyword: { fg: 'magenta', bg: 'default' },
    string: { fg: 'green', bg: 'default' },
    comment: { fg: 'cyan', bg: 'default' },
    number: { fg: 'yellow', bg: 'default' },
    type: { fg: 'blue', bg: 'default' },
    function: { fg: 'yellow', bg: 'default' },
  },
  lineNumber: { fg: 'yellow', bg: 'default' },
  tabBar: { fg: 'black', bg: 'cyan' },
  tabCurrent: { fg: 'black', bg: 'cyan', inverse: true, bold: true },
  status: { fg: 'black', bg: 'cyan', bold: true },
  help: { fg: 'white', bg: 'default' },
  selection: { fg: 'white', bg: 'default', inverse: true },
};

/**
 * Style for a highlighted span; emphasis is drawn bold.
 */
export function spanStyle(theme: Theme, span: Span, selected: boolean): CellStyle {
  const base = theme.syntax[span.style];
  return {
    ...base,
    bold: span.emphasis || !!base.bold,
    inverse: selected || !!base.inverse,
  };
}
