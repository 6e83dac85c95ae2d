/**
 * Neorg integration: `@code <language>` ... `@end` ranged tags
 */

import { D2Renderer } from '../diagrams/d2';
import { MermaidCliRenderer } from '../diagrams/mermaid-cli';
import { PlantUMLRenderer } from '../diagrams/plantuml';
import { rendererContext } from '../diagrams/types';
import type {
  BufferId,
  Diagram,
  Integration,
  IntegrationContext,
  Renderer,
} from '../types';

const CODE_TAG_REGEX = /^(\s*)@code\s+(\S+)/;
const END_TAG_REGEX = /^\s*@end\s*$/;

/**
 * Find diagram blocks in neorg lines.
 *
 * The range starts on the first content row, one row below the `@code` tag,
 * matching how the neorg tree reports block content. Unterminated blocks are
 * skipped.
 */
export function findNeorgDiagrams(
  bufferId: BufferId,
  lines: readonly string[],
  rendererIds: readonly string[],
): Diagram[] {
  const diagrams: Diagram[] = [];
  let row = 0;

  while (row < lines.length) {
    const open = CODE_TAG_REGEX.exec(lines[row]);
    if (!open) {
      row++;
      continue;
    }

    const endRow = lines.findIndex((line, i) => i > row && END_TAG_REGEX.test(line));
    if (endRow === -1) break;

    const language = open[2];
    if (rendererIds.includes(language)) {
      diagrams.push({
        bufferId,
        source: lines.slice(row + 1, endRow).join('\n'),
        rendererId: language,
        range: {
          startRow: row + 1,
          startCol: open[1].length,
          endRow,
          endCol: lines[endRow].length,
        },
      });
    }

    row = endRow + 1;
  }

  return diagrams;
}

export function neorgIntegration(context: IntegrationContext): Integration {
  const renderersContext = rendererContext(context);
  const renderers: Renderer[] = [
    new MermaidCliRenderer(renderersContext),
    new PlantUMLRenderer(renderersContext),
    new D2Renderer(renderersContext),
  ];
  const rendererIds = renderers.map((r) => r.id);

  return {
    id: 'neorg',
    filetypes: ['norg'],
    renderers,
    queryBufferDiagrams(bufferId) {
      return findNeorgDiagrams(bufferId, context.host.lines(bufferId), rendererIds);
    },
  };
}
