/**
 * Option parsing and overrides for the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { setTimeout as sleep } from 'timers/promises';
import { mergeRendererOptions, type DiagramOptions, type StaleJobPolicy } from '../core/config';
import type { DiagramPlugin } from '../core/plugin';
import type { RendererOptions } from '../core/types';
import { IMAGE_PROTOCOLS, type ImageProtocol } from '../node/terminalImage';

export interface RenderFlags {
  mermaidTheme?: string;
  mermaidBackground?: string;
  scale?: number;
  staleJobs?: StaleJobPolicy;
}

export function parseProtocol(value: string): ImageProtocol {
  const protocol = IMAGE_PROTOCOLS.find((p) => p === value);
  if (!protocol) {
    throw new InvalidArgumentError(`expected one of: ${IMAGE_PROTOCOLS.join(', ')}`);
  }
  return protocol;
}

export function parseStaleJobs(value: string): StaleJobPolicy {
  if (value !== 'render' && value !== 'discard') {
    throw new InvalidArgumentError('expected "render" or "discard"');
  }
  return value;
}

export function parseScale(value: string): number {
  const scale = Number(value);
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new InvalidArgumentError('expected a positive number');
  }
  return scale;
}

/**
 * Fold CLI flags over options loaded from the config file
 */
export function applyCliOverrides(options: DiagramOptions, flags: RenderFlags): DiagramOptions {
  const mermaid: RendererOptions = {
    theme: flags.mermaidTheme,
    background: flags.mermaidBackground,
    scale: flags.scale,
  };

  return {
    ...options,
    rendererOptions: mergeRendererOptions(options.rendererOptions ?? {}, { mermaid }),
    staleJobs: flags.staleJobs ?? options.staleJobs,
  };
}

/**
 * Resolve once no render job is being polled
 */
export async function waitForIdle(
  plugin: Pick<DiagramPlugin, 'pendingJobs'>,
  intervalMs = 50,
): Promise<void> {
  while (plugin.pendingJobs > 0) {
    await sleep(intervalMs);
  }
}
