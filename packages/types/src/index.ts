/**
 * @mdsite/types
 * mdsiteの共通型定義
 */

// Document
export type {
  Document,
  Metadata,
  FallbackReason,
  ExtractionResult,
  Post,
  RenderedPage,
} from './document.js';

// Build
export type { BuildStage, BuiltPage, BuildFailure, BuildReport } from './build.js';

// Config
export type {
  MdsiteConfig,
  ProjectConfig,
  ContentConfig,
  ServerConfig,
  WatcherConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type PartialConfig,
} from './config/index.js';

// HTML
export { escapeHtml } from './html.js';

// Errors
export { errorMessage } from './errors.js';
