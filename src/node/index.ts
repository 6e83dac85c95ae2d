/**
 * Node.js host: file-backed buffers, child process jobs, terminal images
 */

export {
  NodeEditorHost,
  detectFiletype,
  FILETYPES_BY_EXTENSION,
  MAIN_WINDOW,
  type NodeEditorHostOptions,
} from './host';
export {
  ChildProcessJobControl,
  SPAWN_FAILED_EXIT_CODE,
  UNKNOWN_JOB_EXIT_CODE,
  type ChildProcessJobControlOptions,
  type SpawnProcess,
} from './jobs';
export { TimerScheduler } from './scheduler';
export {
  TerminalImageBackend,
  IMAGE_PROTOCOLS,
  itermInlineImage,
  type ImageProtocol,
  type TerminalImageBackendOptions,
  type TextSink,
} from './terminalImage';
