/**
 * In-memory set of diagrams currently shown in buffers
 */

import type { ImageLifecycleManager } from './images';
import type { BufferId, DiagramRange, RenderedDiagram } from './types';

function sameRange(a: DiagramRange, b: DiagramRange): boolean {
  return (
    a.startRow === b.startRow &&
    a.startCol === b.startCol &&
    a.endRow === b.endRow &&
    a.endCol === b.endCol
  );
}

/**
 * Holds at most one record per (buffer, range), in insertion order.
 * Lookups are linear; buffers rarely hold more than a handful of diagrams.
 */
export class DiagramRegistry {
  private diagrams: RenderedDiagram[] = [];

  constructor(private readonly images: ImageLifecycleManager) {}

  /**
   * Dispose and drop every diagram of the buffer.
   * @returns number of records removed
   */
  clear(bufferId: BufferId): number {
    const kept: RenderedDiagram[] = [];
    let removed = 0;

    for (const diagram of this.diagrams) {
      if (diagram.bufferId === bufferId) {
        this.images.dispose(diagram.image);
        removed++;
      } else {
        kept.push(diagram);
      }
    }

    this.diagrams = kept;
    return removed;
  }

  clearAll(): void {
    for (const diagram of this.diagrams) {
      this.images.dispose(diagram.image);
    }
    this.diagrams = [];
  }

  /**
   * Insert a materialized diagram. An existing record at the same
   * (buffer, range) is disposed and replaced in place.
   */
  record(diagram: RenderedDiagram): void {
    const index = this.diagrams.findIndex(
      (d) => d.bufferId === diagram.bufferId && sameRange(d.range, diagram.range),
    );

    if (index === -1) {
      this.diagrams.push(diagram);
      return;
    }

    const previous = this.diagrams[index];
    if (previous.image !== diagram.image) {
      this.images.dispose(previous.image);
    }
    this.diagrams[index] = diagram;
  }

  list(bufferId?: BufferId): readonly RenderedDiagram[] {
    if (bufferId === undefined) return [...this.diagrams];
    return this.diagrams.filter((d) => d.bufferId === bufferId);
  }

  get size(): number {
    return this.diagrams.length;
  }
}
