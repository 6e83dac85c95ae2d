/**
 * Mermaid renderer using @mermaid-js/mermaid-cli (mmdc)
 *
 * Requires: npm install -g @mermaid-js/mermaid-cli
 */

import { ProcessRenderer } from './process';
import type { RenderCommand } from './types';

export type MermaidTheme = 'default' | 'dark' | 'forest' | 'neutral' | 'base';

export type MermaidOptions = {
  /** Background colour, e.g. 'transparent' or '#fff' */
  background?: string;
  theme?: MermaidTheme;
  /** Puppeteer scale factor */
  scale?: number;
  width?: number;
  height?: number;
};

export class MermaidCliRenderer extends ProcessRenderer<MermaidOptions> {
  readonly id = 'mermaid';
  protected readonly inputExtension = 'mmd';

  protected buildCommand(
    inputPath: string,
    outputPath: string,
    options: MermaidOptions,
  ): RenderCommand {
    const args = ['-i', inputPath, '-o', outputPath];

    if (options.background) args.push('-b', options.background);
    if (options.theme) args.push('-t', options.theme);
    if (options.scale !== undefined) args.push('-s', String(options.scale));
    if (options.width !== undefined) args.push('--width', String(options.width));
    if (options.height !== undefined) args.push('--height', String(options.height));

    return { command: 'mmdc', args };
  }
}
