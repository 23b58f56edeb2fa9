export { ConfigLoader, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig, type PartialConfig } from './validator.js';
