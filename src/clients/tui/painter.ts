/**
 * Painter
 *
 * Draws a RenderPlan into a ScreenBuffer: tab bar on the first row,
 * content rows below it, status bar and help line at the bottom.
 */

import { cellCount } from '../../core/code-points.ts';
import { formatLineNumber, type RenderPlan, type RenderRow } from '../../state/render-plan.ts';
import type { ScreenBuffer } from './rendering/buffer.ts';
import { spanStyle, type Theme } from './theme.ts';
import type { CellStyle } from './types.ts';

/**
 * What the status row shows while a prompt is open.
 */
export interface PromptView {
  label: string;
  value: string;
  cursorPosition: number;
}

export function paintPlan(
  screen: ScreenBuffer,
  plan: RenderPlan,
  theme: Theme,
  prompt: PromptView | null = null
): void {
  const { width, height } = screen.getSize();
  if (width <= 0 || height <= 0) return;

  paintTabBar(screen, plan, theme, width);

  const contentRows = Math.max(0, height - 3);
  for (let i = 0; i < contentRows; i++) {
    const y = i + 1;
    const row = plan.rows[i];
    screen.fillRow(y, theme.normal);
    if (row) {
      paintRow(screen, y, row, plan.gutterWidth, theme);
    }
  }

  if (height >= 2) {
    const statusY = height - 2;
    screen.fillRow(statusY, theme.status);
    if (prompt) {
      screen.writeString(1, statusY, prompt.label + prompt.value, theme.status);
    } else {
      screen.writeString(1, statusY, plan.status.left, theme.status);
      if (plan.status.right) {
        const x = Math.max(1, width - plan.status.right.length - 1);
        screen.writeString(x, statusY, plan.status.right, theme.status);
      }
    }
  }

  const helpY = height - 1;
  if (helpY > 0) {
    screen.fillRow(helpY, theme.help);
    screen.writeString(1, helpY, plan.help, theme.help);
  }
}

/**
 * Screen position of the prompt cursor.
 */
export function promptCursor(prompt: PromptView, height: number): { x: number; y: number } {
  return { x: 1 + prompt.label.length + prompt.cursorPosition, y: height - 2 };
}

function paintTabBar(screen: ScreenBuffer, plan: RenderPlan, theme: Theme, width: number): void {
  screen.fillRow(0, theme.tabBar);

  let x = 1;
  for (const tab of plan.tabs) {
    const label = ` ${tab.name} `;
    screen.writeString(x, 0, label, tab.current ? theme.tabCurrent : theme.tabBar);
    x += label.length;
    screen.writeString(x, 0, '|', theme.tabBar);
    x++;
  }

  const counter = ` ${plan.tabCounter} `;
  screen.writeString(Math.max(0, width - 10), 0, counter, theme.tabBar);
}

function paintRow(
  screen: ScreenBuffer,
  y: number,
  row: RenderRow,
  gutterWidth: number,
  theme: Theme
): void {
  if (row.lineNumber !== null) {
    screen.writeString(0, y, formatLineNumber(row.lineNumber), theme.lineNumber);
  }

  if (row.selected) {
    const { width } = screen.getSize();
    screen.fillRect(
      { x: gutterWidth, y, width: Math.max(0, width - gutterWidth), height: 1 },
      { ...theme.selection, char: ' ' }
    );
  }

  // Spans cover the row; anything they miss is drawn plain. Span offsets
  // are UTF-16 units, cells are code points.
  const plain = row.selected ? theme.selection : theme.normal;
  let column = 0;
  let x = gutterWidth;
  const draw = (text: string, style: CellStyle): void => {
    screen.writeString(x, y, text, style);
    x += cellCount(text);
  };
  for (const span of row.spans) {
    if (span.start > column) {
      draw(row.text.slice(column, span.start), plain);
    }
    draw(row.text.slice(span.start, span.end), spanStyle(theme, span, row.selected));
    column = span.end;
  }
  if (column < row.text.length) {
    draw(row.text.slice(column), plain);
  }
}
