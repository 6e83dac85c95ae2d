import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';
import { applyCliOverrides, parseProtocol, parseScale, parseStaleJobs, waitForIdle } from './options';

describe('applyCliOverrides', () => {
  it('puts mermaid flags over the config file', () => {
    const options = applyCliOverrides(
      { rendererOptions: { mermaid: { theme: 'forest', width: 800 } }, staleJobs: 'render' },
      { mermaidTheme: 'dark', scale: 2 },
    );

    expect(options).toEqual({
      rendererOptions: { mermaid: { theme: 'dark', width: 800, scale: 2 } },
      staleJobs: 'render',
    });
  });

  it('keeps config values for flags not given', () => {
    const options = applyCliOverrides(
      { rendererOptions: { d2: { layout: 'elk' } }, staleJobs: 'discard', pollIntervalMs: 200 },
      {},
    );

    expect(options).toEqual({
      rendererOptions: { d2: { layout: 'elk' }, mermaid: {} },
      staleJobs: 'discard',
      pollIntervalMs: 200,
    });
  });

  it('overrides the stale job policy', () => {
    expect(applyCliOverrides({}, { staleJobs: 'discard' }).staleJobs).toBe('discard');
  });
});

describe('option parsers', () => {
  it('accept valid values', () => {
    expect(parseProtocol('iterm')).toBe('iterm');
    expect(parseStaleJobs('discard')).toBe('discard');
    expect(parseScale('1.5')).toBe(1.5);
  });

  it('reject invalid values', () => {
    expect(() => parseProtocol('kitty')).toThrow(new InvalidArgumentError('expected one of: iterm, path'));
    expect(() => parseStaleJobs('keep')).toThrow(InvalidArgumentError);
    expect(() => parseScale('0')).toThrow('expected a positive number');
    expect(() => parseScale('big')).toThrow('expected a positive number');
  });
});

describe('waitForIdle', () => {
  it('resolves once no job is pending', async () => {
    let remaining = 3;
    const plugin = {
      get pendingJobs() {
        return remaining--;
      },
    };

    await waitForIdle(plugin, 1);

    expect(remaining).toBe(-1);
  });
});
