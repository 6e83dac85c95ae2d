/**
 * Shared renderer plumbing
 *
 * Renderers shell out to external tools (mmdc, plantuml, d2). They write into
 * the plugin cache directory and hand the running process back as a job.
 */

import type { Logger } from '../logger';
import type { IntegrationContext, JobControl } from '../types';

export interface RendererContext {
  jobs: JobControl;
  /** Directory rendered images and their inputs are written to */
  cacheDir: string;
  isReadable(path: string): boolean;
  logger: Logger;
}

export function rendererContext(context: IntegrationContext): RendererContext {
  const { host, cacheDir, logger } = context;
  return {
    jobs: host.jobs,
    cacheDir,
    isReadable: (path) => host.isReadable(path),
    logger,
  };
}

/**
 * External command line for one render
 */
export interface RenderCommand {
  command: string;
  args: string[];
  /** Feed the input file on stdin */
  stdinFile?: string;
  /** Capture stdout as the output file */
  stdoutFile?: string;
}
