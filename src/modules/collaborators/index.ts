/**
 * Collaborators Module
 *
 * Concrete adapters for the external services each pipeline step calls:
 * - Planner: Claude writes the video prompt and metadata
 * - Generator: Sora renders the video
 * - Cleaner: watermark eraser / ffmpeg crop
 * - Publisher: YouTube upload
 */

import type { AppConfig } from '../config/index.js';
import type { WorkflowCollaborators } from '../workflow/types.js';
import { EnhancerStrategy, FfmpegCropStrategy, StrategyCleaner } from './cleaner.js';
import { SoraVideoGenerator } from './generator.js';
import { ClaudeContentPlanner } from './planner.js';
import { YouTubePublisher } from './publisher.js';

export {
  ClaudeContentPlanner,
  createAnthropicTextModel,
  sanitizeText,
  extractJson,
  parseMetadata,
  fallbackMetadata,
  MAX_TITLE_LENGTH,
  type TextModel,
  type VideoMetadata,
  type ClaudeContentPlannerConfig,
} from './planner.js';

export {
  SoraVideoGenerator,
  createOpenAIVideoApi,
  pickSeconds,
  sizeFor,
  type VideoApi,
  type VideoJob,
  type VideoJobRequest,
  type VideoModel,
  type VideoSeconds,
  type VideoSize,
  type SoraVideoGeneratorConfig,
} from './generator.js';

export {
  StrategyCleaner,
  EnhancerStrategy,
  FfmpegCropStrategy,
  buildCropArgs,
  splitCommand,
  fillCommand,
  parseFfmpegDuration,
  parseFfmpegTime,
  type CleaningStrategy,
  type FfmpegEncoder,
  type StrategyCleanerConfig,
  type EnhancerStrategyConfig,
  type FfmpegCropStrategyConfig,
} from './cleaner.js';

export {
  YouTubePublisher,
  createYouTubeUploadApi,
  watchUrl,
  DEFAULT_CATEGORY_ID,
  type VideoUpload,
  type VideoUploadApi,
  type YouTubeCredentials,
  type YouTubePublisherConfig,
} from './publisher.js';

export { assertNonEmptyFile } from './files.js';
export { runCommand, hasCommand, type CommandResult, type CommandRunner, type CommandProbe } from './shell.js';

/**
 * Build the production collaborators from configuration. Missing
 * credentials are reported by the step that needs them.
 */
export function createCollaborators(config: AppConfig): WorkflowCollaborators {
  return {
    planner: new ClaudeContentPlanner({
      apiKey: config.planner.apiKey,
      model: config.planner.model,
    }),
    generator: new SoraVideoGenerator({
      apiKey: config.generator.apiKey,
      model: config.generator.model,
      tempDir: config.paths.tempDir,
    }),
    cleaner: new StrategyCleaner({
      outputDir: config.paths.outputDir,
      strategies: [
        new EnhancerStrategy({
          eraseCommand: config.cleaner.eraseCommand,
          enhanceCommand: config.cleaner.enhanceCommand,
          tempDir: config.paths.tempDir,
        }),
        new FfmpegCropStrategy(),
      ],
    }),
    publisher: new YouTubePublisher({
      clientId: config.publisher.clientId,
      clientSecret: config.publisher.clientSecret,
      refreshToken: config.publisher.refreshToken,
    }),
  };
}
