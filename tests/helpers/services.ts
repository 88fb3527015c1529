/**
 * Fake viewer services for command tests.
 */

import { createBuffer, type SourceDescriptor, type ViewBuffer } from '../../src/core/buffer.ts';
import { NO_TRUNCATION } from '../../src/core/capacity.ts';
import type { BufferSource, ViewerServices } from '../../src/state/commands.ts';
import type { LoadedText } from '../../src/sources/loader.ts';
import { parseHttpRequest } from '../../src/sources/http-source.ts';
import { webDumpCommand } from '../../src/sources/command-source.ts';
import { shellQuote, sourceLabel, type TextSink } from '../../src/sources/text-source.ts';

export class FakeBufferSource implements BufferSource {
  loaded: SourceDescriptor[] = [];
  reloadLines: string[] = ['reloaded'];
  failWith: Error | null = null;

  async load(descriptor: SourceDescriptor): Promise<ViewBuffer> {
    if (this.failWith) throw this.failWith;
    this.loaded.push(descriptor);
    return createBuffer({
      label: sourceLabel(descriptor),
      lines: ['loaded'],
      language: 'none',
      source: descriptor,
    });
  }

  async reload(_buffer: ViewBuffer): Promise<LoadedText> {
    if (this.failWith) throw this.failWith;
    return { lines: this.reloadLines, truncation: NO_TRUNCATION, language: 'none' };
  }
}

export class FakeClipboard implements TextSink {
  written: string[] = [];
  failWith: Error | null = null;

  async write(text: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.written.push(text);
  }
}

export interface FakeServices extends ViewerServices {
  buffers: FakeBufferSource;
  clipboard: FakeClipboard;
  /** Labels of the prompts shown, in order */
  promptLabels: string[];
  /** Answers given to prompts, in order; null cancels */
  answers: Array<string | null>;
  pickedFile: string | null;
}

export function createFakeServices(): FakeServices {
  const services: FakeServices = {
    buffers: new FakeBufferSource(),
    clipboard: new FakeClipboard(),
    promptLabels: [],
    answers: [],
    pickedFile: null,
    prompt: async (label) => {
      services.promptLabels.push(label);
      const answer = services.answers.shift();
      return answer === undefined ? null : answer;
    },
    pickFile: async () => services.pickedFile,
    parseHttpRequest,
    webDumpCommand: (url) => webDumpCommand(url, shellQuote),
    sqlConnectionString: () => 'postgres://localhost/test',
  };
  return services;
}
