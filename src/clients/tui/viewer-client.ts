/**
 * Viewer Client
 *
 * Owns the terminal for the lifetime of the viewer: renders the current
 * state, waits for a key, resolves it through the keymap and applies the
 * command. Prompts and the file picker run inside the same loop.
 */

import { debugLog } from '../../debug.ts';
import type { Keymap } from '../../input/keymap.ts';
import { applyCommand, type ViewerServices } from '../../state/commands.ts';
import { buildRenderPlan } from '../../state/render-plan.ts';
import { withStatus, type ViewerState } from '../../state/viewer-state.ts';
import { CURSOR, moveToCell } from '../../terminal/ansi.ts';
import type { InputHandler, KeyEvent } from '../../terminal/input.ts';
import { paintPlan, promptCursor, type PromptView } from './painter.ts';
import { LineEditor } from './prompt.ts';
import { Renderer } from './rendering/renderer.ts';
import { DEFAULT_THEME, type Theme } from './theme.ts';
import type { Size } from './types.ts';

/** Longest line a prompt accepts */
export const PROMPT_MAX_LENGTH = 255;

/** Services the client supplies itself */
export type ClientServices = Omit<ViewerServices, 'prompt' | 'pickFile'>;

export interface ViewerClientOptions {
  input: InputHandler;
  write: (data: string) => void;
  size: Size;
  keymap: Keymap;
  services: ClientServices;
  /** Runs with the terminal released; null when nothing was chosen */
  pickFile: () => Promise<string | null>;
  theme?: Theme;
}

export class ViewerClient {
  private _debugName = 'ViewerClient';
  private state: ViewerState;
  private renderer: Renderer;
  private input: InputHandler;
  private write: (data: string) => void;
  private keymap: Keymap;
  private theme: Theme;
  private services: ViewerServices;
  private promptView: PromptView | null = null;

  constructor(initialState: ViewerState, options: ViewerClientOptions) {
    this.state = initialState;
    this.input = options.input;
    this.write = options.write;
    this.keymap = options.keymap;
    this.theme = options.theme ?? DEFAULT_THEME;
    this.renderer = new Renderer(options.size, { output: options.write });
    this.services = {
      ...options.services,
      prompt: (label) => this.prompt(label),
      pickFile: () => this.suspendFor(options.pickFile),
    };
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  getState(): ViewerState {
    return this.state;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Run until a quit command. The terminal is restored however the loop
   * ends.
   */
  async run(): Promise<ViewerState> {
    this.start();
    try {
      while (this.state.running) {
        this.render();
        const event = await this.input.nextKey();
        this.state = await this.handleKey(event);
      }
    } finally {
      this.stop();
    }
    return this.state;
  }

  private start(): void {
    this.input.start();
    this.renderer.initialize();
    this.debugLog(`Started (${this.state.store.buffers.length} buffers)`);
  }

  private stop(): void {
    this.renderer.cleanup();
    this.input.stop();
    this.debugLog('Stopped');
  }

  /**
   * Terminal size changed.
   */
  resize(size: Size): void {
    this.renderer.resize(size);
    if (this.renderer.isInitialized()) {
      this.render();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  private async handleKey(event: KeyEvent): Promise<ViewerState> {
    const command = this.keymap.getCommand(event);
    if (!command) {
      // Any key dismisses the status message
      return withStatus(this.state, null);
    }
    return applyCommand(this.state, command, {
      size: this.renderer.getSize(),
      services: this.services,
    });
  }

  /**
   * Edit a line on the status row until Enter (the text) or Escape (null).
   */
  private async prompt(label: string): Promise<string | null> {
    const editor = new LineEditor({ maxLength: PROMPT_MAX_LENGTH });
    try {
      for (;;) {
        this.promptView = { label, value: editor.value, cursorPosition: editor.cursorPosition };
        this.render();

        const action = editor.handleKey(await this.input.nextKey());
        if (action === 'submit') return editor.value;
        if (action === 'cancel') return null;
      }
    } finally {
      this.promptView = null;
    }
  }

  /**
   * Hand the terminal to another program, then take it back.
   */
  private async suspendFor<T>(task: () => Promise<T>): Promise<T> {
    this.renderer.cleanup();
    this.input.stop();
    try {
      return await task();
    } finally {
      this.input.start();
      this.renderer.initialize();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  private render(): void {
    const size = this.renderer.getSize();
    const plan = buildRenderPlan(this.state, size);
    paintPlan(this.renderer.getBuffer(), plan, this.theme, this.promptView);
    this.renderer.flush();

    if (this.promptView) {
      const cursor = promptCursor(this.promptView, size.height);
      this.write(moveToCell(cursor.x, cursor.y) + CURSOR.show);
    } else {
      this.write(CURSOR.hide);
    }
  }
}
