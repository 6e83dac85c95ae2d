/**
 * D2 renderer using the `d2` binary
 */

import { ProcessRenderer } from './process';
import type { RenderCommand } from './types';

export type D2Options = {
  themeId?: number;
  darkThemeId?: number;
  /** Layout engine, e.g. 'dagre' or 'elk' */
  layout?: string;
  sketch?: boolean;
  scale?: number;
};

export class D2Renderer extends ProcessRenderer<D2Options> {
  readonly id = 'd2';
  protected readonly inputExtension = 'd2';

  protected buildCommand(
    inputPath: string,
    outputPath: string,
    options: D2Options,
  ): RenderCommand {
    const args: string[] = [];

    if (options.themeId !== undefined) args.push(`--theme=${options.themeId}`);
    if (options.darkThemeId !== undefined) args.push(`--dark-theme=${options.darkThemeId}`);
    if (options.layout) args.push(`--layout=${options.layout}`);
    if (options.sketch) args.push('--sketch');
    if (options.scale !== undefined) args.push(`--scale=${options.scale}`);
    args.push(inputPath, outputPath);

    return { command: 'd2', args };
  }
}
