#!/usr/bin/env node
/**
 * diagram-inline CLI
 *
 * Renders the diagram blocks of a markdown or neorg file with the external
 * renderers (mmdc, plantuml, d2) and shows the resulting images inline.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { DiagramPlugin, createConsoleLogger, loadConfigFile, type Logger } from '../core';
import { NodeEditorHost, TerminalImageBackend, type ImageProtocol } from '../node';
import {
  applyCliOverrides,
  parseProtocol,
  parseScale,
  parseStaleJobs,
  waitForIdle,
  type RenderFlags,
} from './options';

// Package version (kept in step with package.json)
const VERSION = '0.1.0';

interface RenderCommandOptions extends RenderFlags {
  config?: string;
  filetype?: string;
  protocol: ImageProtocol;
  verbose?: boolean;
}

interface ListCommandOptions {
  config?: string;
  filetype?: string;
  verbose?: boolean;
}

function fail(logger: Logger, message: string, err: unknown): never {
  logger.error(message);
  logger.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

const program = new Command();

program
  .name('diagram-inline')
  .description('Render diagram blocks of markdown and neorg files as inline images')
  .version(VERSION);

program
  .command('render')
  .description('Render every diagram in a file and show the images')
  .argument('<file>', 'Input markdown or neorg file')
  .option('-c, --config <file>', 'Config file (default: diagram-inline.config.json)')
  .option('--filetype <type>', 'Filetype override (markdown, quarto, rmd, norg)')
  .option('--protocol <name>', 'Image output: iterm or path', parseProtocol, 'path')
  .option('--mermaid-theme <theme>', 'Mermaid theme (default, dark, forest, neutral, base)')
  .option('--mermaid-background <color>', 'Mermaid background colour')
  .option('--scale <factor>', 'Mermaid scale factor', parseScale)
  .option('--stale-jobs <policy>', 'Late job results: render or discard', parseStaleJobs)
  .option('--verbose', 'Verbose output')
  .action(async (file: string, options: RenderCommandOptions) => {
    const logger = createConsoleLogger(options.verbose);

    let plugin: DiagramPlugin;
    let host: NodeEditorHost;
    try {
      const fileOptions = loadConfigFile(options.config, logger);
      host = new NodeEditorHost({ logger });
      plugin = new DiagramPlugin(host);
      plugin.setup({
        ...applyCliOverrides(fileOptions, options),
        imageBackend: new TerminalImageBackend({ protocol: options.protocol }),
        logger,
      });
    } catch (err) {
      fail(logger, 'Error during setup:', err);
    }

    const inputPath = resolve(file);
    try {
      host.openFile(inputPath, options.filetype);
    } catch (err) {
      fail(logger, `Error reading input file: ${file}`, err);
    }

    logger.debug(`Processing: ${inputPath}`);
    logger.debug(`Cache: ${plugin.getCacheDir()}`);

    try {
      const summary = plugin.renderDiagrams();
      if (!summary) {
        process.exitCode = 1;
        return;
      }
      logger.debug(
        `${summary.integration}: ${summary.discovered} diagram(s), ${summary.rendered} cached, ${summary.pending} rendering`,
      );

      await waitForIdle(plugin);
      const shown = plugin.diagrams().length;
      logger.info(`Rendered ${shown} of ${summary.discovered} diagram(s)`);
      if (shown < summary.discovered) {
        process.exitCode = 1;
      }
    } catch (err) {
      fail(logger, 'Error during rendering:', err);
    } finally {
      plugin.teardown();
    }
  });

program
  .command('list')
  .description('List the diagrams found in a file')
  .argument('<file>', 'Input markdown or neorg file')
  .option('-c, --config <file>', 'Config file (default: diagram-inline.config.json)')
  .option('--filetype <type>', 'Filetype override (markdown, quarto, rmd, norg)')
  .option('--verbose', 'Verbose output')
  .action((file: string, options: ListCommandOptions) => {
    const logger = createConsoleLogger(options.verbose);

    try {
      const host = new NodeEditorHost({ logger });
      const plugin = new DiagramPlugin(host);
      plugin.setup({
        ...loadConfigFile(options.config, logger),
        imageBackend: new TerminalImageBackend(),
        logger,
      });

      host.openFile(resolve(file), options.filetype);
      const { integration, diagrams } = plugin.discover();
      logger.debug(`Integration: ${integration.id}`);
      for (const diagram of diagrams) {
        const { startRow, startCol } = diagram.range;
        logger.info(`${startRow + 1}:${startCol + 1} ${diagram.rendererId}`);
      }
      plugin.teardown();
    } catch (err) {
      fail(logger, `Error listing diagrams in ${file}:`, err);
    }
  });

program
  .command('cache-dir')
  .description('Print the directory rendered images are written to')
  .action(() => {
    const plugin = new DiagramPlugin(new NodeEditorHost());
    console.log(plugin.getCacheDir());
  });

// Parse command line
program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
