/**
 * PlantUML renderer using the `plantuml` launcher
 *
 * Requires: plantuml in PATH (Java and plantuml.jar behind it)
 */

import { ProcessRenderer } from './process';
import type { RenderCommand } from './types';

export type PlantUMLOptions = {
  /** Source charset, e.g. 'UTF-8' */
  charset?: string;
};

/**
 * Runs PlantUML in pipe mode: source on stdin, image on stdout. Output file
 * names chosen by PlantUML (`@startuml name`, `_001` suffixes) never apply.
 */
export class PlantUMLRenderer extends ProcessRenderer<PlantUMLOptions> {
  readonly id = 'plantuml';
  protected readonly inputExtension = 'puml';

  protected buildCommand(
    inputPath: string,
    outputPath: string,
    options: PlantUMLOptions,
  ): RenderCommand {
    const args = ['-tpng', '-pipe'];
    if (options.charset) args.push('-charset', options.charset);

    return { command: 'plantuml', args, stdinFile: inputPath, stdoutFile: outputPath };
  }
}
