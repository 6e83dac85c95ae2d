/**
 * Error types raised by the plugin core
 */

/**
 * A required collaborator (image backend, host) was not supplied at setup
 */
export class MissingDependencyError extends Error {
  constructor(readonly dependency: string) {
    super(`diagram: missing dependency \`${dependency}\``);
    this.name = 'MissingDependencyError';
  }
}

/**
 * No configured integration handles the buffer's filetype.
 * Reported to the user as a warning, never fatal.
 */
export class NoIntegrationFoundError extends Error {
  constructor(readonly filetype: string) {
    super(`No integration found for filetype: ${filetype}`);
    this.name = 'NoIntegrationFoundError';
  }
}

/**
 * A discovered diagram names a renderer its integration does not provide
 */
export class RendererNotFoundError extends Error {
  constructor(readonly rendererId: string) {
    super(`diagram: cannot find renderer with id \`${rendererId}\``);
    this.name = 'RendererNotFoundError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
