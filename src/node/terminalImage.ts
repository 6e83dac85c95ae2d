/**
 * Image backend for plain terminals
 *
 * - 'iterm': inline image escape sequence (iTerm2, WezTerm, VS Code terminal)
 * - 'path': one `row:col path` line per image, rows and columns 1-based
 *
 * Terminal output cannot be taken back, so `clear()` only stops later paints.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';
import type { ImageBackend, ImageHandle, ImageOptions } from '../core/types';

export type ImageProtocol = 'iterm' | 'path';

export const IMAGE_PROTOCOLS: readonly ImageProtocol[] = ['iterm', 'path'];

export interface TextSink {
  write(chunk: string): unknown;
}

export interface TerminalImageBackendOptions {
  protocol?: ImageProtocol;
  output?: TextSink;
}

export function itermInlineImage(name: string, data: Buffer): string {
  const encodedName = Buffer.from(name).toString('base64');
  return `\x1b]1337;File=name=${encodedName};size=${data.length};inline=1:${data.toString('base64')}\x07`;
}

class TerminalImage implements ImageHandle {
  private cleared = false;

  constructor(
    private readonly path: string,
    private readonly options: ImageOptions,
    private readonly protocol: ImageProtocol,
    private readonly output: TextSink,
  ) {}

  render(): void {
    if (this.cleared) return;

    const position = `${this.options.y + 1}:${this.options.x + 1}`;
    if (this.protocol === 'path') {
      this.output.write(`${position} ${this.path}\n`);
      return;
    }

    const data = readFileSync(this.path);
    this.output.write(`${position}\n${itermInlineImage(basename(this.path), data)}\n`);
  }

  clear(): void {
    this.cleared = true;
  }
}

export class TerminalImageBackend implements ImageBackend {
  private readonly protocol: ImageProtocol;
  private readonly output: TextSink;

  constructor(options: TerminalImageBackendOptions = {}) {
    this.protocol = options.protocol ?? 'path';
    this.output = options.output ?? process.stdout;
  }

  fromFile(path: string, options: ImageOptions): ImageHandle {
    return new TerminalImage(path, options, this.protocol, this.output);
  }
}
