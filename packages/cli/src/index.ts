export { createProgram } from './cli.js';
export type { UpdateOptions, UpdateRunner } from './cli.js';
export { crawlReporter } from './crawl-reporter.js';
export { formatUpdateError } from './format-update-error.js';
export { createLogger } from './logger.js';
export type { Logger, Namespace } from './logger.js';
export { resolveSettings, runUpdate } from './run-update.js';
export {
  DEFAULT_SETTINGS,
  loadSettingsFile,
  mergeSettings,
  SettingsError,
} from './settings.js';
export type { CrawlerSettings, LastmodSettings } from './settings.js';
export { UpdateError } from './update-error.js';
export type { UpdatePhase } from './update-error.js';
export { UpdateOrchestrator } from './update-orchestrator.js';
export type { UpdateLoggers, UpdateRequest, UpdateResult } from './update-orchestrator.js';
