import { createHash } from 'crypto';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { JobId, Renderer, RendererOptions, RenderResult } from '../types';
import type { RenderCommand, RendererContext } from './types';

/**
 * Stable text form of the options that are actually set
 */
export function serializeOptions(options: RendererOptions): string {
  return Object.keys(options)
    .filter((key) => options[key] !== undefined)
    .sort()
    .map((key) => `${key}=${String(options[key])}`)
    .join(';');
}

/**
 * Base for renderers backed by an external process.
 *
 * Output goes to `<cacheDir>/<hash>.png`, the hash covering renderer id,
 * options and source. A render whose output is still being written by a
 * running job reuses that job; otherwise a readable output is returned as-is.
 */
export abstract class ProcessRenderer<O extends RendererOptions = RendererOptions>
  implements Renderer<O>
{
  abstract readonly id: string;

  /** Extension of the source file handed to the tool */
  protected abstract readonly inputExtension: string;

  private readonly inFlight = new Map<string, JobId>();

  constructor(protected readonly context: RendererContext) {}

  protected abstract buildCommand(
    inputPath: string,
    outputPath: string,
    options: O,
  ): RenderCommand;

  hash(source: string, options: O): string {
    return createHash('sha256')
      .update(this.id)
      .update('\0')
      .update(serializeOptions(options))
      .update('\0')
      .update(source)
      .digest('hex');
  }

  render(source: string, options: O): RenderResult {
    const { cacheDir, jobs, logger } = this.context;
    const hash = this.hash(source, options);
    const outputPath = join(cacheDir, `${hash}.png`);

    this.forgetFinishedJobs();
    const running = this.inFlight.get(outputPath);
    if (running !== undefined) {
      return { filePath: outputPath, jobId: running };
    }

    if (this.context.isReadable(outputPath)) {
      return { filePath: outputPath };
    }

    mkdirSync(cacheDir, { recursive: true });
    const inputPath = join(cacheDir, `${hash}.${this.inputExtension}`);
    writeFileSync(inputPath, source);

    const { command, args, ...redirect } = this.buildCommand(inputPath, outputPath, options);
    logger.debug(`diagram/${this.id}: ${command} ${args.join(' ')}`);

    const jobId = jobs.start(command, args, { cwd: cacheDir, ...redirect });
    this.inFlight.set(outputPath, jobId);
    return { filePath: outputPath, jobId };
  }

  private forgetFinishedJobs(): void {
    if (this.inFlight.size === 0) return;
    const entries = [...this.inFlight];
    const states = this.context.jobs.wait(entries.map(([, jobId]) => jobId));
    entries.forEach(([outputPath], i) => {
      if (states[i] !== 'running') this.inFlight.delete(outputPath);
    });
  }
}
