/**
 * Node.js implementation of EditorHost
 *
 * For use in CLI context: buffers are files read into memory, there is a
 * single window, and events are delivered by calling `emit`.
 */

import { EventEmitter } from 'events';
import { accessSync, constants, readFileSync } from 'fs';
import { homedir } from 'os';
import { extname, join } from 'path';
import { createConsoleLogger, type Logger } from '../core/logger';
import type {
  BufferId,
  EditorHost,
  JobControl,
  NotifyLevel,
  Scheduler,
  Unsubscribe,
  WindowId,
} from '../core/types';
import { ChildProcessJobControl } from './jobs';
import { TimerScheduler } from './scheduler';

export const FILETYPES_BY_EXTENSION: Record<string, string | undefined> = {
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.qmd': 'quarto',
  '.rmd': 'rmd',
  '.norg': 'norg',
};

export const MAIN_WINDOW: WindowId = 1;

export function detectFiletype(path: string): string {
  return FILETYPES_BY_EXTENSION[extname(path).toLowerCase()] ?? '';
}

export interface NodeEditorHostOptions {
  logger?: Logger;
  jobs?: JobControl;
  scheduler?: Scheduler;
  /**
   * Base for the cache directory. Default: $XDG_CACHE_HOME or ~/.cache
   */
  cacheHome?: string;
}

interface NodeBuffer {
  filetype: string;
  lines: string[];
}

interface FileTypeListener {
  filetypes: readonly string[];
  handler: (bufferId: BufferId) => void;
}

export class NodeEditorHost implements EditorHost {
  readonly jobs: JobControl;
  readonly scheduler: Scheduler;

  private readonly logger: Logger;
  private readonly cacheHome: string;
  private readonly buffers = new Map<BufferId, NodeBuffer>();
  private readonly commands = new Map<string, () => void>();
  private readonly fileTypeListeners = new Set<FileTypeListener>();
  private readonly events = new EventEmitter();
  private nextBufferId = 1;
  private current: BufferId = 0;

  constructor(options: NodeEditorHostOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger();
    this.jobs = options.jobs ?? new ChildProcessJobControl({ logger: this.logger });
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.cacheHome =
      options.cacheHome || process.env.XDG_CACHE_HOME || join(homedir(), '.cache');
  }

  /**
   * Read a file into a new buffer and make it current
   *
   * @param filetype - overrides detection from the file extension
   */
  openFile(path: string, filetype?: string): BufferId {
    const text = readFileSync(path, 'utf-8');
    return this.openBuffer(text.split(/\r?\n/), filetype ?? detectFiletype(path));
  }

  /**
   * Create a buffer from lines and make it current
   */
  openBuffer(lines: string[], filetype: string): BufferId {
    const bufferId = this.nextBufferId++;
    this.buffers.set(bufferId, { filetype: '', lines: [...lines] });
    this.current = bufferId;
    this.setFiletype(bufferId, filetype);
    return bufferId;
  }

  /**
   * Change a buffer's filetype and notify FileType listeners
   */
  setFiletype(bufferId: BufferId, filetype: string): void {
    this.requireBuffer(bufferId).filetype = filetype;
    for (const listener of [...this.fileTypeListeners]) {
      if (listener.filetypes.includes(filetype)) {
        listener.handler(bufferId);
      }
    }
  }

  setCurrentBuffer(bufferId: BufferId): void {
    this.requireBuffer(bufferId);
    this.current = bufferId;
  }

  /**
   * Invoke a user command by name
   */
  runCommand(name: string): void {
    const handler = this.commands.get(name);
    if (!handler) {
      throw new Error(`Unknown command: ${name}`);
    }
    handler();
  }

  /**
   * Fire a buffer activity event such as 'CursorMoved'
   */
  emit(bufferId: BufferId, event: string): void {
    this.events.emit(`${bufferId}:${event}`);
  }

  currentBuffer(): BufferId {
    return this.current;
  }

  currentWindow(): WindowId {
    return MAIN_WINDOW;
  }

  filetype(bufferId: BufferId): string {
    return this.buffers.get(bufferId)?.filetype ?? '';
  }

  lines(bufferId: BufferId): string[] {
    return [...(this.buffers.get(bufferId)?.lines ?? [])];
  }

  isReadable(path: string): boolean {
    try {
      accessSync(path, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  notify(message: string, level: NotifyLevel): void {
    this.logger[level](message);
  }

  createUserCommand(name: string, handler: () => void, options: { desc: string }): Unsubscribe {
    this.commands.set(name, handler);
    this.logger.debug(`command ${name}: ${options.desc}`);
    return () => {
      if (this.commands.get(name) === handler) {
        this.commands.delete(name);
      }
    };
  }

  onFileType(filetypes: readonly string[], handler: (bufferId: BufferId) => void): Unsubscribe {
    const listener: FileTypeListener = { filetypes: [...filetypes], handler };
    this.fileTypeListeners.add(listener);
    return () => {
      this.fileTypeListeners.delete(listener);
    };
  }

  onBufferEvents(bufferId: BufferId, events: readonly string[], handler: () => void): Unsubscribe {
    const names = events.map((event) => `${bufferId}:${event}`);
    for (const name of names) {
      this.events.on(name, handler);
    }
    return () => {
      for (const name of names) {
        this.events.off(name, handler);
      }
    };
  }

  stdpath(_kind: 'cache'): string {
    return join(this.cacheHome, 'diagram-inline');
  }

  private requireBuffer(bufferId: BufferId): NodeBuffer {
    const buffer = this.buffers.get(bufferId);
    if (!buffer) {
      throw new Error(`Invalid buffer id: ${bufferId}`);
    }
    return buffer;
  }
}
