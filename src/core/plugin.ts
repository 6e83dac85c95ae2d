/**
 * Plugin session: wires configuration, registry, poller and orchestrator to
 * an editor host, and exposes the render/clear commands.
 */

import { join } from 'path';
import { resolveConfig, type DiagramConfig, type DiagramOptions } from './config';
import { MissingDependencyError, NoIntegrationFoundError } from './errors';
import { ImageLifecycleManager } from './images';
import { JobPoller } from './jobPoller';
import { createConsoleLogger, type Logger } from './logger';
import { RenderOrchestrator, type Discovery, type RenderSummary } from './orchestrator';
import { DiagramRegistry } from './registry';
import type {
  BufferId,
  EditorHost,
  ImageBackend,
  Integration,
  RenderedDiagram,
  Unsubscribe,
} from './types';

export const RENDER_COMMAND = 'DiagramRender';
export const CLEAR_COMMAND = 'DiagramClear';

export interface SetupOptions extends DiagramOptions {
  imageBackend?: ImageBackend;
  logger?: Logger;
}

interface Session {
  config: DiagramConfig;
  integrations: Integration[];
  registry: DiagramRegistry;
  poller: JobPoller;
  orchestrator: RenderOrchestrator;
  disposers: Unsubscribe[];
  hookedBuffers: Set<BufferId>;
}

export class DiagramPlugin {
  private session: Session | null = null;

  constructor(private readonly host: EditorHost) {}

  /**
   * Start a session. Calling setup again tears the previous one down first.
   *
   * @throws MissingDependencyError when no image backend is given
   */
  setup(options: SetupOptions = {}): void {
    const { imageBackend, logger = createConsoleLogger(), ...diagramOptions } = options;
    if (!imageBackend) {
      throw new MissingDependencyError('image backend');
    }

    this.teardown();

    const config = resolveConfig(diagramOptions);
    const cacheDir = this.getCacheDir();
    const integrations = config.integrations.map((create) =>
      create({ host: this.host, cacheDir, logger }),
    );

    const images = new ImageLifecycleManager(imageBackend, logger);
    const registry = new DiagramRegistry(images);
    const poller = new JobPoller(
      this.host.jobs,
      this.host.scheduler,
      logger,
      config.pollIntervalMs,
    );
    const orchestrator = new RenderOrchestrator({
      host: this.host,
      integrations,
      registry,
      images,
      poller,
      logger,
      rendererOptions: config.rendererOptions,
      anchorRowOffsets: config.anchorRowOffsets,
      staleJobs: config.staleJobs,
    });

    const session: Session = {
      config,
      integrations,
      registry,
      poller,
      orchestrator,
      disposers: [],
      hookedBuffers: new Set(),
    };
    this.session = session;

    session.disposers.push(
      this.host.createUserCommand(
        RENDER_COMMAND,
        () => {
          this.renderDiagrams();
        },
        { desc: 'Render diagrams in the current buffer' },
      ),
      this.host.createUserCommand(
        CLEAR_COMMAND,
        () => {
          this.clearBuffer();
        },
        { desc: 'Clear diagrams in the current buffer' },
      ),
    );

    const current = this.host.currentBuffer();
    const currentFiletype = this.host.filetype(current);

    for (const integration of integrations) {
      session.disposers.push(
        this.host.onFileType(integration.filetypes, (bufferId) => {
          this.installClearHook(session, bufferId);
        }),
      );

      if (integration.filetypes.includes(currentFiletype)) {
        this.installClearHook(session, current);
      }
    }
  }

  /**
   * Drop every registration, image and pending poll of the session
   */
  teardown(): void {
    const session = this.session;
    if (!session) return;

    this.session = null;
    session.poller.cancelAll();
    for (const dispose of session.disposers) {
      dispose();
    }
    session.registry.clearAll();
  }

  /**
   * Render the current buffer in the current window.
   * A filetype without integration produces a warning and returns null.
   */
  renderDiagrams(): RenderSummary | null {
    const { orchestrator } = this.requireSession();
    const bufferId = this.host.currentBuffer();
    const windowId = this.host.currentWindow();

    try {
      return orchestrator.renderBuffer(bufferId, windowId);
    } catch (error) {
      if (error instanceof NoIntegrationFoundError) {
        this.host.notify(error.message, 'warn');
        return null;
      }
      throw error;
    }
  }

  clearBuffer(bufferId: BufferId = this.host.currentBuffer()): void {
    this.requireSession().orchestrator.clearBuffer(bufferId);
  }

  /**
   * Diagrams of a buffer as its integration reports them, without rendering
   */
  discover(bufferId: BufferId = this.host.currentBuffer()): Discovery {
    return this.requireSession().orchestrator.discover(bufferId);
  }

  /**
   * Scratch and output directory for renderers
   */
  getCacheDir(): string {
    return join(this.host.stdpath('cache'), 'diagram-cache');
  }

  get config(): DiagramConfig | null {
    return this.session ? this.session.config : null;
  }

  get integrations(): readonly Integration[] {
    return this.session ? this.session.integrations : [];
  }

  diagrams(bufferId?: BufferId): readonly RenderedDiagram[] {
    return this.session ? this.session.registry.list(bufferId) : [];
  }

  /**
   * Render jobs still being polled
   */
  get pendingJobs(): number {
    return this.session ? this.session.poller.pending : 0;
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new Error('diagram: setup() has not been called');
    }
    return this.session;
  }

  private installClearHook(session: Session, bufferId: BufferId): void {
    const events = session.config.events.clearBuffer;
    if (events.length === 0 || session.hookedBuffers.has(bufferId)) return;

    session.hookedBuffers.add(bufferId);
    session.disposers.push(
      this.host.onBufferEvents(bufferId, events, () => {
        session.orchestrator.clearBuffer(bufferId);
      }),
    );
  }
}
