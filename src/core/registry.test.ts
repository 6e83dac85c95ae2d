import { describe, it, expect } from 'vitest';
import { FakeImage, FakeImageBackend, RecordingLogger, diagramAt } from '../testing/fakes';
import { ImageLifecycleManager } from './images';
import { DiagramRegistry } from './registry';
import type { RenderedDiagram } from './types';

function setup() {
  const backend = new FakeImageBackend();
  const logger = new RecordingLogger();
  const registry = new DiagramRegistry(new ImageLifecycleManager(backend, logger));
  return { backend, logger, registry };
}

function rendered(bufferId: number, startRow: number): RenderedDiagram & { image: FakeImage } {
  const image = new FakeImage('/cache/x.png', {
    buffer: bufferId,
    window: 1,
    x: 0,
    y: startRow,
    withVirtualPadding: true,
    inline: true,
  });
  return { ...diagramAt(bufferId, startRow), image };
}

describe('DiagramRegistry', () => {
  it('clears only the records of the given buffer', () => {
    const { registry } = setup();
    const a = rendered(1, 0);
    const b = rendered(1, 10);
    const c = rendered(2, 0);
    registry.record(a);
    registry.record(b);
    registry.record(c);

    expect(registry.clear(1)).toBe(2);
    expect(a.image.clears).toBe(1);
    expect(b.image.clears).toBe(1);
    expect(c.image.clears).toBe(0);
    expect(registry.list()).toEqual([c]);
  });

  it('is idempotent when clearing an empty buffer', () => {
    const { registry } = setup();
    registry.record(rendered(2, 0));

    expect(registry.clear(1)).toBe(0);
    expect(registry.clear(1)).toBe(0);
    expect(registry.size).toBe(1);
  });

  it('replaces a record at the same buffer and range', () => {
    const { registry } = setup();
    const first = rendered(1, 4);
    const second = rendered(1, 4);
    registry.record(first);
    registry.record(second);

    expect(registry.size).toBe(1);
    expect(registry.list(1)[0]).toBe(second);
    expect(first.image.clears).toBe(1);
    expect(second.image.clears).toBe(0);
  });

  it('does not dispose an image recorded twice', () => {
    const { registry } = setup();
    const diagram = rendered(1, 4);
    registry.record(diagram);
    registry.record({ ...diagram });

    expect(registry.size).toBe(1);
    expect(diagram.image.clears).toBe(0);
  });

  it('keeps records in insertion order', () => {
    const { registry } = setup();
    registry.record(rendered(1, 20));
    registry.record(rendered(1, 5));

    expect(registry.list(1).map((d) => d.range.startRow)).toEqual([20, 5]);
  });

  it('returns a copy from list', () => {
    const { registry } = setup();
    registry.record(rendered(1, 0));
    const listed = registry.list();
    registry.clear(1);

    expect(listed).toHaveLength(1);
    expect(registry.list()).toHaveLength(0);
  });

  it('keeps clearing after an image fails to clear', () => {
    const { registry, logger } = setup();
    const broken = rendered(1, 0);
    broken.image.failOnClear = true;
    const fine = rendered(1, 10);
    registry.record(broken);
    registry.record(fine);

    expect(registry.clear(1)).toBe(2);
    expect(fine.image.clears).toBe(1);
    expect(logger.messages('warn')).toEqual([
      'diagram: failed to clear image: image already gone',
    ]);
  });

  it('clears every buffer with clearAll', () => {
    const { registry } = setup();
    const a = rendered(1, 0);
    const b = rendered(2, 0);
    registry.record(a);
    registry.record(b);
    registry.clearAll();

    expect(registry.size).toBe(0);
    expect(a.image.clears).toBe(1);
    expect(b.image.clears).toBe(1);
  });
});

describe('ImageLifecycleManager', () => {
  it('creates an inline padded image at the anchor without painting it', () => {
    const backend = new FakeImageBackend();
    const images = new ImageLifecycleManager(backend, new RecordingLogger());

    const image = images.materialize('/cache/a.png', 3, 1000, { row: 7, col: 2 });

    expect(backend.created).toHaveLength(1);
    expect(backend.created[0]).toBe(image);
    expect(backend.created[0].path).toBe('/cache/a.png');
    expect(backend.created[0].options).toEqual({
      buffer: 3,
      window: 1000,
      x: 2,
      y: 7,
      withVirtualPadding: true,
      inline: true,
    });
    expect(backend.created[0].renders).toBe(0);
  });
});
