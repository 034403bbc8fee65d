export * from './conversion-types.js';
export { ConversionManager } from './conversion-manager.js';
export type { ConversionManagerOptions, StartResult } from './conversion-manager.js';
export {
  validateConversionRequest,
  normalizeOutputPath,
  hasDensePositions,
  DEFAULT_ACCEPTED_EXTENSIONS,
} from './input-validator.js';
export type { ValidationResult, ValidatorOptions } from './input-validator.js';
export {
  buildFfmpegArgs,
  buildConcatFilter,
  buildMetadataArgs,
  orderSourceFiles,
  DEFAULT_AUDIO_BITRATE,
} from './ffmpeg-command.js';
export type { CommandOptions } from './ffmpeg-command.js';
export { ProcessRunner, RunningProcess, nodeProcessProvider } from './process-runner.js';
export type { ChildHandle, ExitStatus, ProcessProvider, RunnerOptions } from './process-runner.js';
export { ProgressRelay } from './progress-relay.js';
export type { ConversionEventListener } from './progress-relay.js';
export { ResultReporter } from './result-reporter.js';
export { FfmpegProgressParser } from './ffmpeg-progress.js';
export { createDurationProbe } from './duration-probe.js';
export type { DurationProbe } from './duration-probe.js';
export { resolveFfmpeg, getToolStatus, getConfig } from './tool-paths.js';
export type { ToolPathsConfig, ResolvedEngine } from './tool-paths.js';
export { RollingLogger, getLogger, configureLogger, silentLogger } from './rolling-logger.js';
export type { Logger, LogLevel } from './rolling-logger.js';
