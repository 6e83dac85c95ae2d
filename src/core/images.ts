/**
 * Creation and disposal of the images shown for diagrams
 */

import type { Logger } from './logger';
import type { BufferId, ImageBackend, ImageHandle, WindowId } from './types';

export interface ImageAnchor {
  row: number;
  col: number;
}

export class ImageLifecycleManager {
  constructor(
    private readonly backend: ImageBackend,
    private readonly logger: Logger,
  ) {}

  /**
   * Create an inline, padded image at the anchor. Nothing is painted until
   * the caller invokes `render()` on the returned handle.
   */
  materialize(
    filePath: string,
    bufferId: BufferId,
    windowId: WindowId,
    anchor: ImageAnchor,
  ): ImageHandle {
    return this.backend.fromFile(filePath, {
      buffer: bufferId,
      window: windowId,
      x: anchor.col,
      y: anchor.row,
      withVirtualPadding: true,
      inline: true,
    });
  }

  /**
   * Release an image. Safe on images that were never painted; a backend
   * failure is logged and does not reach the caller.
   */
  dispose(image: ImageHandle): void {
    try {
      image.clear();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`diagram: failed to clear image: ${message}`);
    }
  }
}
