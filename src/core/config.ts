/**
 * Configuration types for diagram-inline
 * Shared between the plugin session and the CLI
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import { BUILTIN_INTEGRATIONS } from './integrations';
import { markdownIntegration } from './integrations/markdown';
import type { Logger } from './logger';
import type { IntegrationFactory, RendererOptions } from './types';

/**
 * What happens when a render job finishes after its buffer was cleared or
 * rendered again:
 * - 'render': the late image is still drawn
 * - 'discard': the late image is dropped
 */
export type StaleJobPolicy = 'render' | 'discard';

export type RendererOptionsMap = Record<string, RendererOptions>;

export interface DiagramConfig {
  // Integrations tried in order; the first one claiming the filetype wins
  integrations: IntegrationFactory[];

  // Per-renderer options keyed by renderer id
  rendererOptions: RendererOptionsMap;

  events: {
    // Buffer activity that clears the buffer's diagrams
    clearBuffer: string[];
  };

  // Row shift applied to image anchors per filetype
  anchorRowOffsets: Record<string, number>;

  staleJobs: StaleJobPolicy;

  pollIntervalMs: number;
}

/**
 * User-supplied overrides, merged over DEFAULT_CONFIG at setup
 */
export interface DiagramOptions {
  integrations?: IntegrationFactory[];
  rendererOptions?: RendererOptionsMap;
  events?: { clearBuffer?: string[] };
  anchorRowOffsets?: Record<string, number>;
  staleJobs?: StaleJobPolicy;
  pollIntervalMs?: number;
}

export const DEFAULT_CONFIG: DiagramConfig = {
  integrations: [markdownIntegration],
  rendererOptions: {
    mermaid: {
      background: undefined,
      theme: undefined,
      scale: undefined,
      width: undefined,
      height: undefined,
    },
  },
  events: {
    clearBuffer: ['InsertEnter', 'CursorMoved'],
  },
  anchorRowOffsets: {
    norg: -1, // neorg reports code blocks one row below the tag
  },
  staleJobs: 'render',
  pollIntervalMs: 100,
};

function definedEntries(options: RendererOptions): RendererOptions {
  const result: RendererOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Deep merge renderer options. Undefined override values keep the default.
 */
export function mergeRendererOptions(
  target: RendererOptionsMap,
  source: RendererOptionsMap = {},
): RendererOptionsMap {
  const result: RendererOptionsMap = {};
  for (const [id, options] of Object.entries(target)) {
    result[id] = { ...options };
  }
  for (const [id, options] of Object.entries(source)) {
    result[id] = { ...result[id], ...definedEntries(options) };
  }
  return result;
}

/**
 * Resolve user options against defaults.
 * Renderer options and anchor offsets are merged; integrations and clear
 * events are replaced when given.
 */
export function resolveConfig(
  options: DiagramOptions = {},
  defaults: DiagramConfig = DEFAULT_CONFIG,
): DiagramConfig {
  return {
    integrations: [...(options.integrations ?? defaults.integrations)],
    rendererOptions: mergeRendererOptions(
      defaults.rendererOptions,
      options.rendererOptions,
    ),
    events: {
      clearBuffer: [
        ...(options.events?.clearBuffer ?? defaults.events.clearBuffer),
      ],
    },
    anchorRowOffsets: {
      ...defaults.anchorRowOffsets,
      ...options.anchorRowOffsets,
    },
    staleJobs: options.staleJobs ?? defaults.staleJobs,
    pollIntervalMs: options.pollIntervalMs ?? defaults.pollIntervalMs,
  };
}

const optionValueSchema = z.union([z.string(), z.number(), z.boolean()]).nullable();

const configFileSchema = z
  .object({
    integrations: z.array(z.string()),
    rendererOptions: z.record(z.record(optionValueSchema)),
    events: z.object({ clearBuffer: z.array(z.string()) }).partial(),
    anchorRowOffsets: z.record(z.number().int()),
    staleJobs: z.enum(['render', 'discard'], {
      errorMap: () => ({ message: 'expected "render" or "discard"' }),
    }),
    pollIntervalMs: z.number().positive(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

function formatIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return `${path}: ${issue.message}`;
}

function resolveIntegration(id: string): IntegrationFactory {
  const factory = BUILTIN_INTEGRATIONS[id];
  if (!factory) {
    throw new ConfigError(`unknown integration \`${id}\``);
  }
  return factory;
}

// null stands for "unset" in JSON
function toRendererOptions(raw: NonNullable<ConfigFile['rendererOptions']>): RendererOptionsMap {
  const result: RendererOptionsMap = {};
  for (const [id, options] of Object.entries(raw)) {
    const parsed: RendererOptions = {};
    for (const [key, value] of Object.entries(options)) {
      if (value !== null) parsed[key] = value;
    }
    result[id] = parsed;
  }
  return result;
}

/**
 * Validate a parsed config file. Integrations are referenced by id.
 */
export function parseConfigObject(raw: unknown): DiagramOptions {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssue(result.error));
  }

  const { integrations, rendererOptions, events, ...rest } = result.data;
  const options: DiagramOptions = { ...rest };
  if (integrations) {
    options.integrations = integrations.map(resolveIntegration);
  }
  if (rendererOptions) {
    options.rendererOptions = toRendererOptions(rendererOptions);
  }
  if (events?.clearBuffer) {
    options.events = { clearBuffer: events.clearBuffer };
  }
  return options;
}

export const DEFAULT_CONFIG_PATHS = [
  'diagram-inline.config.json',
  '.diagram-inline.json',
];

/**
 * Load options from a JSON config file.
 *
 * Without a path the default file names are tried in the working directory.
 * A missing file yields no options; an unreadable or malformed file logs a
 * warning and yields no options. Invalid settings in a well-formed file throw
 * ConfigError.
 */
export function loadConfigFile(
  configPath: string | undefined,
  logger: Logger,
): DiagramOptions {
  let configFile: string | undefined;

  if (configPath) {
    configFile = configPath;
  } else {
    configFile = DEFAULT_CONFIG_PATHS.find((path) => existsSync(path));
  }

  if (!configFile || !existsSync(configFile)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configFile, 'utf-8'));
  } catch (e) {
    logger.warn(`Warning: Failed to load config from ${configFile}:`, e);
    return {};
  }

  return parseConfigObject(parsed);
}
