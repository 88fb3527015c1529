/**
 * File Source
 *
 * Reads text files from disk. PDFs are converted with pdftotext when it
 * is installed.
 */

import * as fs from 'fs';
import { LoadFailureError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import {
  shellQuote,
  type CommandRunner,
  type DescriptorOf,
  type SourceResult,
  type TextSource,
} from './text-source.ts';

export function isPdfPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.pdf');
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FileSource implements TextSource<DescriptorOf<'file'>> {
  constructor(private readonly runCommand: CommandRunner) {}

  async read(descriptor: DescriptorOf<'file'>): Promise<SourceResult> {
    const filePath = descriptor.path;

    if (isPdfPath(filePath)) {
      return this.readPdf(filePath);
    }

    try {
      const stat = await fs.promises.stat(filePath);
      if (stat.isDirectory()) {
        throw new LoadFailureError(filePath, 'is a directory');
      }
      return { text: await fs.promises.readFile(filePath, 'utf8') };
    } catch (error) {
      if (error instanceof LoadFailureError) throw error;
      const code = errorCode(error);
      debugLog(`[FileSource] Read failed for ${filePath}: ${code ?? String(error)}`);
      const reason =
        code === 'ENOENT' ? 'no such file' : code === 'EACCES' ? 'permission denied' : 'unreadable';
      throw new LoadFailureError(filePath, reason, { cause: error });
    }
  }

  private async readPdf(filePath: string): Promise<SourceResult> {
    const output = await this.runCommand(`pdftotext -layout ${shellQuote(filePath)} -`);
    if (output.exitCode !== 0) {
      throw new LoadFailureError(filePath, output.stderr.trim() || 'pdftotext failed');
    }
    return { text: output.stdout };
  }
}
