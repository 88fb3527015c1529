/**
 * Viewer Errors
 *
 * Every recoverable failure becomes status-bar text; only a terminal
 * init failure ends the process.
 */

export type ViewerErrorCode =
  | 'LOAD_FAILURE'
  | 'BUFFER_LIMIT_REACHED'
  | 'CLOSE_REJECTED'
  | 'EXPORT_FAILURE'
  | 'TERMINAL_INIT_FAILURE';

export class ViewerError extends Error {
  readonly code: ViewerErrorCode;

  constructor(code: ViewerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ViewerError';
    this.code = code;
  }
}

/**
 * A source could not be read, or it produced no lines.
 */
export class LoadFailureError extends ViewerError {
  readonly source: string;

  constructor(source: string, reason: string, options?: { cause?: unknown }) {
    super('LOAD_FAILURE', `Failed to load ${source}: ${reason}`, options);
    this.name = 'LoadFailureError';
    this.source = source;
  }
}

export class BufferLimitError extends ViewerError {
  readonly limit: number;

  constructor(limit: number) {
    super('BUFFER_LIMIT_REACHED', `Buffer limit reached (${limit})`);
    this.name = 'BufferLimitError';
    this.limit = limit;
  }
}

export class CloseRejectedError extends ViewerError {
  constructor() {
    super('CLOSE_REJECTED', 'Cannot close the last buffer');
    this.name = 'CloseRejectedError';
  }
}

/**
 * Copied text could not be handed to the clipboard.
 */
export class ExportFailureError extends ViewerError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('EXPORT_FAILURE', `Copy failed: ${reason}`, options);
    this.name = 'ExportFailureError';
  }
}

export class TerminalInitError extends ViewerError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('TERMINAL_INIT_FAILURE', `Terminal initialization failed: ${reason}`, options);
    this.name = 'TerminalInitError';
  }
}

export function isViewerError(error: unknown): error is ViewerError {
  return error instanceof ViewerError;
}

/**
 * Render any thrown value as one line of status text.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
