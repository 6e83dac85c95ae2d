/**
 * Markdown integration: fenced code blocks whose language names a renderer
 *
 * Examples: ```mermaid, ```plantuml, ```d2, and Quarto's ```{mermaid}
 */

import MarkdownIt from 'markdown-it';
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

/**
 * Language of a fence info string: first word, Quarto braces stripped
 */
export function fenceLanguage(info: string): string {
  const [first = ''] = info.trim().split(/\s+/);
  return first.replace(/^\{/, '').replace(/\}$/, '').trim();
}

function indentation(line: string | undefined): number {
  if (line === undefined) return 0;
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}

/**
 * Find diagram fences in markdown lines.
 * Fences in languages outside `rendererIds` are ignored.
 */
export function findMarkdownDiagrams(
  bufferId: BufferId,
  lines: readonly string[],
  rendererIds: readonly string[],
  md: MarkdownIt = new MarkdownIt(),
): Diagram[] {
  const tokens = md.parse(lines.join('\n'), {});
  const diagrams: Diagram[] = [];

  for (const token of tokens) {
    if (token.type !== 'fence' || !token.map) continue;

    const language = fenceLanguage(token.info);
    if (!rendererIds.includes(language)) continue;

    const [startRow, endLine] = token.map;
    const endRow = Math.max(startRow, endLine - 1);

    diagrams.push({
      bufferId,
      source: token.content,
      rendererId: language,
      range: {
        startRow,
        startCol: indentation(lines[startRow]),
        endRow,
        endCol: lines[endRow]?.length ?? 0,
      },
    });
  }

  return diagrams;
}

export function markdownIntegration(context: IntegrationContext): Integration {
  const renderersContext = rendererContext(context);
  const renderers: Renderer[] = [
    new MermaidCliRenderer(renderersContext),
    new PlantUMLRenderer(renderersContext),
    new D2Renderer(renderersContext),
  ];
  const rendererIds = renderers.map((r) => r.id);
  const md = new MarkdownIt();

  return {
    id: 'markdown',
    filetypes: ['markdown', 'quarto', 'rmd'],
    renderers,
    queryBufferDiagrams(bufferId) {
      return findMarkdownDiagrams(
        bufferId,
        context.host.lines(bufferId),
        rendererIds,
        md,
      );
    },
  };
}
