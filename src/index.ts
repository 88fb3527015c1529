/**
 * peek - Terminal Text Viewer
 *
 * Entry point: parse arguments, load configuration and the initial
 * buffers, then hand the terminal to the viewer client.
 */

import { ViewerClient } from './clients/tui/viewer-client.ts';
import { USAGE, VERSION, parseArgs, type CliOptions } from './cli.ts';
import { settings } from './config/settings.ts';
import { UserConfigManager } from './config/user-config.ts';
import type { ViewBuffer } from './core/buffer.ts';
import type { CapacityPolicy } from './core/capacity.ts';
import { BufferLimitError, describeError } from './core/errors.ts';
import { debugLog, setDebugEnabled } from './debug.ts';
import { Keymap } from './input/keymap.ts';
import { ClipboardSink } from './sources/clipboard.ts';
import { createShellRunner } from './sources/command-runner.ts';
import { CommandSource, webDumpCommand } from './sources/command-source.ts';
import { pickFileWithFzf } from './sources/file-picker.ts';
import { FileSource } from './sources/file-source.ts';
import { HttpSource, parseHttpRequest } from './sources/http-source.ts';
import { BufferLoader } from './sources/loader.ts';
import { RssSource } from './sources/rss-source.ts';
import { SqlSource } from './sources/sql-source.ts';
import { StdinSource } from './sources/stdin-source.ts';
import { shellQuote, type SourceRegistry } from './sources/text-source.ts';
import { createViewerState, withStatus } from './state/viewer-state.ts';
import { InputHandler } from './terminal/input.ts';
import { acquireTerminal, terminalSize } from './terminal/tty.ts';

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), Boolean(process.stdin.isTTY));
  switch (parsed.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(`peek v${VERSION}`);
      return 0;
    case 'error':
      console.error(`peek: ${parsed.message}`);
      console.error(USAGE);
      return 1;
    case 'run':
      return run(parsed.options);
  }
}

async function run(options: CliOptions): Promise<number> {
  setDebugEnabled(options.debug);

  const keymap = new Keymap();
  const problems = await new UserConfigManager().load(settings, keymap);
  if (options.wrap !== undefined) settings.set('viewer.wrap', options.wrap);
  if (options.lineNumbers !== undefined) settings.set('viewer.lineNumbers', options.lineNumbers);

  const cwd = process.cwd();
  const runCommand = createShellRunner({
    cwd,
    manWidth: process.stdout.isTTY ? process.stdout.columns : undefined,
  });
  const userAgent = settings.getResolved('http.userAgent');
  const sources: SourceRegistry = {
    file: new FileSource(runCommand),
    stdin: new StdinSource(),
    command: new CommandSource(runCommand),
    http: new HttpSource({ userAgent }),
    rss: new RssSource(userAgent),
    sql: new SqlSource(),
  };
  const capacity: CapacityPolicy = {
    maxLines: settings.get('viewer.maxLines'),
    maxLineLength: settings.get('viewer.maxLineLength'),
    maxBuffers: settings.get('viewer.maxBuffers'),
  };
  const loader = new BufferLoader(sources, capacity);

  const buffers: ViewBuffer[] = [];
  for (const descriptor of options.descriptors) {
    if (buffers.length >= capacity.maxBuffers) {
      console.error(`peek: ${new BufferLimitError(capacity.maxBuffers).message}`);
      break;
    }
    try {
      buffers.push(await loader.load(descriptor));
    } catch (error) {
      debugLog(`[Main] ${describeError(error)}`);
      console.error(`peek: ${describeError(error)}`);
    }
  }
  if (buffers.length === 0) {
    return 1;
  }

  const initial = createViewerState(
    {
      showLineNumbers: settings.get('viewer.lineNumbers'),
      wrapEnabled: settings.get('viewer.wrap'),
      horizScrollStep: settings.get('viewer.horizontalScrollStep'),
      maxBuffers: capacity.maxBuffers,
    },
    buffers
  );
  const state = problems[0] ? withStatus(initial, problems[0]) : initial;

  const terminal = acquireTerminal();
  const client = new ViewerClient(state, {
    input: new InputHandler(terminal.input),
    write: (data) => {
      terminal.output.write(data);
    },
    size: terminalSize(terminal.output),
    keymap,
    services: {
      buffers: loader,
      clipboard: new ClipboardSink(runCommand, settings.get('clipboard.command')),
      parseHttpRequest,
      webDumpCommand: (url) => webDumpCommand(url, shellQuote),
      sqlConnectionString: () => settings.getResolved('sql.connectionString'),
    },
    pickFile: () => pickFileWithFzf(cwd),
  });

  const onResize = (): void => client.resize(terminalSize(terminal.output));
  terminal.output.on('resize', onResize);
  try {
    await client.run();
  } finally {
    terminal.output.off('resize', onResize);
    terminal.release();
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    debugLog(`[Main] Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    console.error(`peek: ${describeError(error)}`);
    process.exit(1);
  });
