/**
 * Render pipeline: integration lookup, diagram discovery, dispatch to
 * renderers and image materialization
 */

import type { StaleJobPolicy, RendererOptionsMap } from './config';
import { NoIntegrationFoundError, RendererNotFoundError } from './errors';
import type { ImageLifecycleManager } from './images';
import type { JobPoller } from './jobPoller';
import type { Logger } from './logger';
import type { DiagramRegistry } from './registry';
import {
  isPendingResult,
  type BufferId,
  type Diagram,
  type EditorHost,
  type Integration,
  type Renderer,
  type WindowId,
} from './types';

export interface OrchestratorOptions {
  host: EditorHost;
  integrations: readonly Integration[];
  registry: DiagramRegistry;
  images: ImageLifecycleManager;
  poller: JobPoller;
  logger: Logger;
  rendererOptions: RendererOptionsMap;
  anchorRowOffsets: Record<string, number>;
  staleJobs: StaleJobPolicy;
}

export interface Discovery {
  integration: Integration;
  diagrams: Diagram[];
}

export interface RenderSummary {
  integration: string;
  /** Diagrams returned by the integration */
  discovered: number;
  /** Diagrams materialized during the call */
  rendered: number;
  /** Diagrams waiting on a render job */
  pending: number;
}

export class RenderOrchestrator {
  // Bumped on every clear; late completions compare against it under 'discard'
  private readonly generations = new Map<BufferId, number>();

  constructor(private readonly options: OrchestratorOptions) {}

  /**
   * First integration claiming the buffer's filetype
   */
  resolveIntegration(bufferId: BufferId): Integration {
    const filetype = this.options.host.filetype(bufferId);
    const integration = this.options.integrations.find((i) =>
      i.filetypes.includes(filetype),
    );
    if (!integration) {
      throw new NoIntegrationFoundError(filetype);
    }
    return integration;
  }

  discover(bufferId: BufferId): Discovery {
    const integration = this.resolveIntegration(bufferId);
    return {
      integration,
      diagrams: integration.queryBufferDiagrams(bufferId),
    };
  }

  /**
   * Replace the buffer's images with freshly rendered ones.
   *
   * Throws NoIntegrationFoundError before touching the registry, and
   * RendererNotFoundError when a diagram names a renderer its integration
   * lacks. A renderer or image failure for one diagram is logged and the
   * remaining diagrams are still processed.
   */
  renderBuffer(bufferId: BufferId, windowId: WindowId): RenderSummary {
    const { integration, diagrams } = this.discover(bufferId);
    this.clearBuffer(bufferId);
    const generation = this.generation(bufferId);

    const summary: RenderSummary = {
      integration: integration.id,
      discovered: diagrams.length,
      rendered: 0,
      pending: 0,
    };

    for (const diagram of diagrams) {
      const renderer = this.findRenderer(integration, diagram.rendererId);
      const rendererOptions = this.options.rendererOptions[renderer.id] ?? {};

      try {
        const result = renderer.render(diagram.source, rendererOptions);
        const materialize = () =>
          this.materialize(diagram, result.filePath, windowId, generation);

        if (isPendingResult(result)) {
          if (this.options.poller.watch(result.jobId, () => { materialize(); })) {
            summary.pending++;
          }
        } else if (materialize()) {
          summary.rendered++;
        }
      } catch (error) {
        this.options.logger.error(
          `diagram/${renderer.id}: failed to render diagram at row ${diagram.range.startRow}:`,
          error,
        );
      }
    }

    return summary;
  }

  clearBuffer(bufferId: BufferId): void {
    this.options.registry.clear(bufferId);
    this.generations.set(bufferId, this.generation(bufferId) + 1);
  }

  private generation(bufferId: BufferId): number {
    return this.generations.get(bufferId) ?? 0;
  }

  private findRenderer(integration: Integration, rendererId: string): Renderer {
    const renderer = integration.renderers.find((r) => r.id === rendererId);
    if (!renderer) {
      throw new RendererNotFoundError(rendererId);
    }
    return renderer;
  }

  /**
   * Show the rendered file for a diagram and record it.
   * Returns false when the file is missing or the pass was superseded.
   */
  private materialize(
    diagram: Diagram,
    filePath: string,
    windowId: WindowId,
    generation: number,
  ): boolean {
    const { host, images, registry, logger } = this.options;
    const { bufferId, range } = diagram;

    if (
      this.options.staleJobs === 'discard' &&
      generation !== this.generation(bufferId)
    ) {
      logger.debug(`diagram: dropping stale render for buffer ${bufferId}`);
      return false;
    }

    // renderer failed or produced nothing
    if (!host.isReadable(filePath)) return false;

    const offset = this.options.anchorRowOffsets[host.filetype(bufferId)] ?? 0;
    const row = Math.max(0, range.startRow + offset);

    const image = images.materialize(filePath, bufferId, windowId, {
      row,
      col: range.startCol,
    });
    registry.record({ ...diagram, image });
    image.render();
    return true;
  }
}
