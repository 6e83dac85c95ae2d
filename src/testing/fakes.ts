/**
 * In-process stand-ins for the editor host, job control, timers and the
 * image backend. Used by the test suites only.
 */

import type { Logger } from '../core/logger';
import type {
  BufferId,
  Diagram,
  EditorHost,
  ImageBackend,
  ImageHandle,
  ImageOptions,
  Integration,
  JobControl,
  JobId,
  JobStartOptions,
  JobWaitResult,
  NotifyLevel,
  Renderer,
  RendererOptions,
  RenderResult,
  Scheduler,
  TimerHandle,
  Unsubscribe,
  WindowId,
} from '../core/types';

export interface LogEntry {
  level: NotifyLevel;
  args: unknown[];
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(...args: unknown[]): void {
    this.entries.push({ level: 'debug', args });
  }

  info(...args: unknown[]): void {
    this.entries.push({ level: 'info', args });
  }

  warn(...args: unknown[]): void {
    this.entries.push({ level: 'warn', args });
  }

  error(...args: unknown[]): void {
    this.entries.push({ level: 'error', args });
  }

  /**
   * First argument of every entry at the level
   */
  messages(level: NotifyLevel): unknown[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.args[0]);
  }
}

export interface StartedJob {
  id: JobId;
  command: string;
  args: readonly string[];
  options?: JobStartOptions;
}

export class FakeJobControl implements JobControl {
  readonly started: StartedJob[] = [];
  readonly waited: JobId[] = [];
  private readonly states = new Map<JobId, JobWaitResult>();
  private nextId = 1;

  start(command: string, args: readonly string[], options?: JobStartOptions): JobId {
    const id = this.nextId++;
    this.started.push({ id, command, args: [...args], options });
    this.states.set(id, 'running');
    return id;
  }

  wait(jobIds: readonly JobId[]): JobWaitResult[] {
    this.waited.push(...jobIds);
    return jobIds.map((id) => this.states.get(id) ?? -1);
  }

  finish(jobId: JobId, exitCode = 0): void {
    this.states.set(jobId, exitCode);
  }
}

interface ManualTimer extends TimerHandle {
  nextAt: number;
  intervalMs: number;
  tick: () => void;
}

/**
 * Scheduler driven by `advance`; nothing fires on its own
 */
export class ManualScheduler implements Scheduler {
  now = 0;
  /** When set, the next `every` call returns null */
  failNext = false;
  private readonly timers: ManualTimer[] = [];

  every(initialDelayMs: number, intervalMs: number, tick: () => void): TimerHandle | null {
    if (this.failNext) {
      this.failNext = false;
      return null;
    }

    let active = true;
    const timer: ManualTimer = {
      nextAt: this.now + initialDelayMs,
      intervalMs,
      tick,
      isActive: () => active,
      cancel: () => {
        active = false;
      },
    };
    this.timers.push(timer);
    return timer;
  }

  /**
   * Move the clock forward, firing due ticks in time order
   */
  advance(ms: number): void {
    const target = this.now + ms;

    for (;;) {
      const due = this.timers
        .filter((t) => t.isActive() && t.nextAt <= target)
        .sort((a, b) => a.nextAt - b.nextAt)[0];
      if (!due) break;

      this.now = due.nextAt;
      due.nextAt += Math.max(1, due.intervalMs);
      due.tick();
    }

    this.now = target;
  }

  get activeCount(): number {
    return this.timers.filter((t) => t.isActive()).length;
  }
}

export class FakeImage implements ImageHandle {
  renders = 0;
  clears = 0;
  failOnClear = false;

  constructor(
    readonly path: string,
    readonly options: ImageOptions,
  ) {}

  render(): void {
    this.renders++;
  }

  clear(): void {
    this.clears++;
    if (this.failOnClear) {
      throw new Error('image already gone');
    }
  }
}

export class FakeImageBackend implements ImageBackend {
  readonly created: FakeImage[] = [];

  fromFile(path: string, options: ImageOptions): FakeImage {
    const image = new FakeImage(path, options);
    this.created.push(image);
    return image;
  }
}

interface FakeBuffer {
  filetype: string;
  lines: string[];
}

export interface Notification {
  message: string;
  level: NotifyLevel;
}

export class FakeHost implements EditorHost {
  readonly jobs = new FakeJobControl();
  readonly scheduler = new ManualScheduler();
  readonly notifications: Notification[] = [];
  readonly commands = new Map<string, { handler: () => void; desc: string }>();
  readonly readable = new Set<string>();
  cacheHome = '/tmp/fake-cache';
  window: WindowId = 1000;

  private readonly buffers = new Map<BufferId, FakeBuffer>();
  private readonly fileTypeListeners = new Set<{
    filetypes: readonly string[];
    handler: (bufferId: BufferId) => void;
  }>();
  private readonly eventHandlers = new Map<string, Set<() => void>>();
  private current: BufferId = 0;

  addBuffer(bufferId: BufferId, lines: string[], filetype: string): BufferId {
    this.buffers.set(bufferId, { filetype: '', lines });
    this.current = bufferId;
    this.setFiletype(bufferId, filetype);
    return bufferId;
  }

  setFiletype(bufferId: BufferId, filetype: string): void {
    const buffer = this.buffers.get(bufferId);
    if (buffer) buffer.filetype = filetype;
    for (const listener of [...this.fileTypeListeners]) {
      if (listener.filetypes.includes(filetype)) listener.handler(bufferId);
    }
  }

  setCurrentBuffer(bufferId: BufferId): void {
    this.current = bufferId;
  }

  emit(bufferId: BufferId, event: string): void {
    for (const handler of [...(this.eventHandlers.get(`${bufferId}:${event}`) ?? [])]) {
      handler();
    }
  }

  runCommand(name: string): void {
    const command = this.commands.get(name);
    if (!command) throw new Error(`Unknown command: ${name}`);
    command.handler();
  }

  listenerCount(bufferId: BufferId, event: string): number {
    return this.eventHandlers.get(`${bufferId}:${event}`)?.size ?? 0;
  }

  get fileTypeListenerCount(): number {
    return this.fileTypeListeners.size;
  }

  currentBuffer(): BufferId {
    return this.current;
  }

  currentWindow(): WindowId {
    return this.window;
  }

  filetype(bufferId: BufferId): string {
    return this.buffers.get(bufferId)?.filetype ?? '';
  }

  lines(bufferId: BufferId): string[] {
    return [...(this.buffers.get(bufferId)?.lines ?? [])];
  }

  isReadable(path: string): boolean {
    return this.readable.has(path);
  }

  notify(message: string, level: NotifyLevel): void {
    this.notifications.push({ message, level });
  }

  createUserCommand(name: string, handler: () => void, options: { desc: string }): Unsubscribe {
    this.commands.set(name, { handler, desc: options.desc });
    return () => {
      this.commands.delete(name);
    };
  }

  onFileType(filetypes: readonly string[], handler: (bufferId: BufferId) => void): Unsubscribe {
    const listener = { filetypes, handler };
    this.fileTypeListeners.add(listener);
    return () => {
      this.fileTypeListeners.delete(listener);
    };
  }

  onBufferEvents(bufferId: BufferId, events: readonly string[], handler: () => void): Unsubscribe {
    const keys = events.map((event) => `${bufferId}:${event}`);
    for (const key of keys) {
      const handlers = this.eventHandlers.get(key) ?? new Set<() => void>();
      handlers.add(handler);
      this.eventHandlers.set(key, handlers);
    }
    return () => {
      for (const key of keys) this.eventHandlers.get(key)?.delete(handler);
    };
  }

  stdpath(_kind: 'cache'): string {
    return this.cacheHome;
  }
}

export interface RenderCall {
  source: string;
  options: RendererOptions;
}

/**
 * Renderer whose result is computed by `respond`
 */
export function stubRenderer(
  id: string,
  respond: (source: string, options: RendererOptions) => RenderResult,
): Renderer & { calls: RenderCall[] } {
  const calls: RenderCall[] = [];
  return {
    id,
    calls,
    render(source, options) {
      calls.push({ source, options });
      return respond(source, options);
    },
  };
}

export interface StubIntegrationOptions {
  id?: string;
  filetypes?: string[];
  renderers: Renderer[];
  diagrams: (bufferId: BufferId) => Diagram[];
}

export function stubIntegration(options: StubIntegrationOptions): Integration {
  return {
    id: options.id ?? 'stub',
    filetypes: options.filetypes ?? ['markdown'],
    renderers: options.renderers,
    queryBufferDiagrams: options.diagrams,
  };
}

/**
 * Diagram at rows [startRow, startRow + 2] of a buffer
 */
export function diagramAt(
  bufferId: BufferId,
  startRow: number,
  rendererId = 'mermaid',
  source = 'graph TD; A-->B',
): Diagram {
  return {
    bufferId,
    source,
    rendererId,
    range: { startRow, startCol: 0, endRow: startRow + 2, endCol: 3 },
  };
}
