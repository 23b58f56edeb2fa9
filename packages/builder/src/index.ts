/**
 * @mdsite/builder
 *
 * Markdown文書からHTMLページを生成するビルドパイプラインと監視
 */

export { BuildPipeline, type BuildPipelineOptions } from './build/build-pipeline.js';
export {
  WatchOrchestrator,
  type WatchOrchestratorOptions,
  type WatchExit,
  type Rebuilder,
  type ChangeWatcher,
} from './watch/watch-orchestrator.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export { FileWatcher, type FileWatcherOptions, type FileChangeEvent } from './discovery/file-watcher.js';
export {
  extractMetadata,
  loadDocument,
  defaultMetadata,
  type LoadedDocument,
} from './metadata/metadata-extractor.js';
export { sanitizeSlug, deriveTitle, slugFromFilename, fallbackSlug } from './metadata/slug.js';
export { rewriteLinks, INTERNAL_LINK_PREFIX } from './render/link-rewriter.js';
export { renderMarkdown } from './render/markdown.js';
export {
  renderPage,
  createRenderedPage,
  POSTS_DIR,
  type PageMetadata,
} from './render/page-renderer.js';
export { formatDate, parseIsoDate, type FormattedDate } from './date.js';
export { SourceNotFoundError, WatchSetupError } from './errors.js';
