import type { IntegrationFactory } from '../types';
import { markdownIntegration } from './markdown';
import { neorgIntegration } from './neorg';

/**
 * Integrations addressable by id from config files
 */
export const BUILTIN_INTEGRATIONS: Record<string, IntegrationFactory | undefined> = {
  markdown: markdownIntegration,
  neorg: neorgIntegration,
};

export { markdownIntegration, findMarkdownDiagrams, fenceLanguage } from './markdown';
export { neorgIntegration, findNeorgDiagrams } from './neorg';
