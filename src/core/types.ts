/**
 * Core types shared between the plugin core, the Node host and the CLI
 */

import type { Logger } from './logger';

export type BufferId = number;
export type WindowId = number;
export type JobId = number;

/**
 * Location of a diagram block inside a buffer (zero-based rows and columns)
 */
export interface DiagramRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/**
 * Drawn image bound to a buffer/window, as returned by the image backend
 */
export interface ImageHandle {
  /** Paint the image onto its window */
  render(): void;
  clear(): void;
}

/**
 * One diagram block discovered in a buffer.
 * `image` is set once the rendered file has been materialized.
 */
export interface Diagram {
  bufferId: BufferId;
  source: string;
  rendererId: string;
  range: DiagramRange;
  image?: ImageHandle;
}

/**
 * Diagram that has been materialized and may live in the registry
 */
export type RenderedDiagram = Diagram & { image: ImageHandle };

export type RenderResult =
  | { filePath: string }
  | { filePath: string; jobId: JobId };

export type RendererOptionValue = string | number | boolean | undefined;

export type RendererOptions = Record<string, RendererOptionValue>;

/**
 * Turns diagram source into an image file, either immediately (cache hit)
 * or through an external job that writes `filePath` when it exits.
 */
export interface Renderer<O extends RendererOptions = RendererOptions> {
  readonly id: string;
  render(source: string, options: O): RenderResult;
}

/**
 * Finds diagrams inside buffers of the given filetypes
 */
export interface Integration {
  readonly id: string;
  readonly filetypes: readonly string[];
  readonly renderers: readonly Renderer[];
  queryBufferDiagrams(bufferId: BufferId): Diagram[];
}

/**
 * Result of a non-blocking job status query: still running, or the exit code
 */
export type JobWaitResult = 'running' | number;

export interface JobStartOptions {
  cwd?: string;
  /** File fed to the process on stdin */
  stdinFile?: string;
  /** File receiving stdout; it only appears once the process exits with 0 */
  stdoutFile?: string;
}

export interface JobControl {
  /**
   * Start an external process without blocking.
   * Always returns an id; a process that could not be spawned reports
   * finished on the next `wait`.
   */
  start(command: string, args: readonly string[], options?: JobStartOptions): JobId;

  /**
   * Non-blocking state query, one result per id in the same order.
   * Unknown ids report finished. A finished job may be forgotten once
   * reported, so later queries for it get the unknown-id result.
   */
  wait(jobIds: readonly JobId[]): JobWaitResult[];
}

export interface TimerHandle {
  isActive(): boolean;
  cancel(): void;
}

/**
 * Recurring timers running on the host's serialized callback context
 */
export interface Scheduler {
  /**
   * @returns the timer, or null when the host could not create one
   */
  every(initialDelayMs: number, intervalMs: number, tick: () => void): TimerHandle | null;
}

export interface ImageOptions {
  buffer: BufferId;
  window: WindowId;
  x: number;
  y: number;
  withVirtualPadding: boolean;
  inline: boolean;
}

export interface ImageBackend {
  fromFile(path: string, options: ImageOptions): ImageHandle;
}

/**
 * Services handed to integration factories when a plugin session starts
 */
export interface IntegrationContext {
  host: EditorHost;
  cacheDir: string;
  logger: Logger;
}

export type IntegrationFactory = (context: IntegrationContext) => Integration;

export type NotifyLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Disposer returned by every host registration
 */
export type Unsubscribe = () => void;

/**
 * Editor environment the plugin runs inside.
 *
 * Buffers, windows, filetype detection and event delivery belong to the host;
 * the plugin only reads buffer contents and registers callbacks.
 */
export interface EditorHost {
  readonly jobs: JobControl;
  readonly scheduler: Scheduler;

  currentBuffer(): BufferId;
  currentWindow(): WindowId;

  /**
   * Filetype of a buffer, '' when unknown
   */
  filetype(bufferId: BufferId): string;

  /**
   * Buffer contents, one entry per line
   */
  lines(bufferId: BufferId): string[];

  isReadable(path: string): boolean;

  notify(message: string, level: NotifyLevel): void;

  createUserCommand(name: string, handler: () => void, options: { desc: string }): Unsubscribe;

  /**
   * Called whenever a buffer gets one of the given filetypes
   */
  onFileType(filetypes: readonly string[], handler: (bufferId: BufferId) => void): Unsubscribe;

  /**
   * Called when any of the named activity events fires in the buffer
   */
  onBufferEvents(bufferId: BufferId, events: readonly string[], handler: () => void): Unsubscribe;

  /**
   * Standard per-user directory, as `stdpath('cache')`
   */
  stdpath(kind: 'cache'): string;
}

export function isPendingResult(
  result: RenderResult,
): result is { filePath: string; jobId: JobId } {
  return 'jobId' in result;
}
