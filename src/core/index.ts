/**
 * Core module exports
 *
 * Platform-neutral core used by any editor host.
 */

// Types
export {
  isPendingResult,
  type BufferId,
  type WindowId,
  type JobId,
  type Diagram,
  type DiagramRange,
  type RenderedDiagram,
  type RenderResult,
  type Renderer,
  type RendererOptions,
  type RendererOptionValue,
  type Integration,
  type IntegrationContext,
  type IntegrationFactory,
  type JobControl,
  type JobStartOptions,
  type JobWaitResult,
  type Scheduler,
  type TimerHandle,
  type ImageBackend,
  type ImageHandle,
  type ImageOptions,
  type EditorHost,
  type NotifyLevel,
  type Unsubscribe,
} from './types';

// Errors and logging
export {
  MissingDependencyError,
  NoIntegrationFoundError,
  RendererNotFoundError,
  ConfigError,
} from './errors';
export { createConsoleLogger, type Logger } from './logger';

// Configuration
export {
  type DiagramConfig,
  type DiagramOptions,
  type RendererOptionsMap,
  type StaleJobPolicy,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATHS,
  resolveConfig,
  mergeRendererOptions,
  parseConfigObject,
  loadConfigFile,
} from './config';

// Orchestration
export { DiagramRegistry } from './registry';
export { ImageLifecycleManager, type ImageAnchor } from './images';
export { JobPoller, DEFAULT_POLL_INTERVAL_MS } from './jobPoller';
export {
  RenderOrchestrator,
  type OrchestratorOptions,
  type Discovery,
  type RenderSummary,
} from './orchestrator';
export {
  DiagramPlugin,
  RENDER_COMMAND,
  CLEAR_COMMAND,
  type SetupOptions,
} from './plugin';

// Integrations
export {
  BUILTIN_INTEGRATIONS,
  markdownIntegration,
  findMarkdownDiagrams,
  fenceLanguage,
  neorgIntegration,
  findNeorgDiagrams,
} from './integrations';

// Diagram renderers
export { rendererContext, type RendererContext, type RenderCommand } from './diagrams/types';
export { ProcessRenderer, serializeOptions } from './diagrams/process';
export { MermaidCliRenderer, type MermaidOptions, type MermaidTheme } from './diagrams/mermaid-cli';
export { PlantUMLRenderer, type PlantUMLOptions } from './diagrams/plantuml';
export { D2Renderer, type D2Options } from './diagrams/d2';
