/**
 * Video Generator
 *
 * Renders the planned prompt with OpenAI's Sora video API: create a job,
 * poll it until it finishes, then download the MP4 into the temp directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import OpenAI from 'openai';
import { systemClock, toFileTimestamp, type Clock } from '../../utils/calendar.js';
import { assertNonEmptyFile } from './files.js';
import {
  ConfigurationError,
  ExternalServiceError,
  ResourceError,
  errorMessage,
} from '../workflow/errors.js';
import type { ProgressReporter, VideoGenerator, VideoResolution } from '../workflow/types.js';

// =============================================================================
// VIDEO API
// =============================================================================

export type VideoModel = 'sora-2' | 'sora-2-pro';
export type VideoSeconds = '4' | '8' | '12';
export type VideoSize = '720x1280' | '1280x720' | '1024x1792' | '1792x1024';

export interface VideoJobRequest {
  prompt: string;
  model: VideoModel;
  seconds: VideoSeconds;
  size: VideoSize;
}

export interface VideoJob {
  id: string;
  status: string;
  progress?: number | null;
  error?: { message: string } | null;
}

/**
 * The parts of the video API the generator calls
 */
export interface VideoApi {
  create(request: VideoJobRequest): Promise<VideoJob>;
  retrieve(id: string): Promise<VideoJob>;
  download(id: string): Promise<Uint8Array>;
}

export function createOpenAIVideoApi(apiKey: string): VideoApi {
  const client = new OpenAI({ apiKey });

  return {
    create: (request) => client.videos.create(request),
    retrieve: (id) => client.videos.retrieve(id),
    async download(id) {
      const response = await client.videos.downloadContent(id);
      return new Uint8Array(await response.arrayBuffer());
    },
  };
}

// =============================================================================
// PARAMETER MAPPING
// =============================================================================

/**
 * Shortest supported clip that covers the requested duration, capped at 12s
 */
export function pickSeconds(durationSeconds: number): VideoSeconds {
  if (durationSeconds <= 4) return '4';
  if (durationSeconds <= 8) return '8';
  return '12';
}

export function sizeFor(resolution: VideoResolution): VideoSize {
  return resolution === '1080p' ? '1792x1024' : '1280x720';
}

// =============================================================================
// GENERATOR
// =============================================================================

export interface SoraVideoGeneratorConfig {
  apiKey?: string;
  model: VideoModel;
  tempDir: string;
  /** Delay between status polls (default: 10 seconds) */
  pollIntervalMs?: number;
  /** Give up after this many polls (default: 120, i.e. 20 minutes) */
  maxPolls?: number;
  /** Replaces the OpenAI client, e.g. in tests */
  api?: VideoApi;
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class SoraVideoGenerator implements VideoGenerator {
  private api: VideoApi | null;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: Clock;

  constructor(private readonly config: SoraVideoGeneratorConfig) {
    this.api = config.api ?? null;
    this.pollIntervalMs = config.pollIntervalMs ?? 10_000;
    this.maxPolls = config.maxPolls ?? 120;
    this.sleep = config.sleep ?? defaultSleep;
    this.clock = config.clock ?? systemClock;
  }

  private getApi(): VideoApi {
    if (!this.api) {
      if (!this.config.apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY is required for video generation');
      }
      this.api = createOpenAIVideoApi(this.config.apiKey);
    }
    return this.api;
  }

  async generate(
    promptText: string,
    durationSeconds: number,
    resolution: VideoResolution,
    onProgress?: ProgressReporter
  ): Promise<string> {
    const api = this.getApi();
    const request: VideoJobRequest = {
      prompt: promptText,
      model: this.config.model,
      seconds: pickSeconds(durationSeconds),
      size: sizeFor(resolution),
    };

    console.log(`[Generator] Requesting ${request.seconds}s ${request.size} video from ${request.model}`);

    let job: VideoJob;
    try {
      job = await api.create(request);
    } catch (error) {
      throw new ExternalServiceError(`Failed to start video generation: ${errorMessage(error)}`, { cause: error });
    }

    let polls = 0;
    while (job.status !== 'completed') {
      if (job.status === 'failed') {
        throw new ExternalServiceError(`Video generation failed: ${job.error?.message ?? 'unknown error'}`);
      }
      if (polls >= this.maxPolls) {
        throw new ExternalServiceError(`Video generation timed out (job ${job.id} still ${job.status})`);
      }

      await this.sleep(this.pollIntervalMs);
      polls++;

      try {
        job = await api.retrieve(job.id);
      } catch (error) {
        throw new ExternalServiceError(`Failed to check video job ${job.id}: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      if (job.status !== 'completed' && job.status !== 'failed') {
        onProgress?.(job.progress ?? 0, job.status === 'queued' ? 'queued' : 'rendering video');
      }
    }

    let content: Uint8Array;
    try {
      content = await api.download(job.id);
    } catch (error) {
      throw new ExternalServiceError(`Failed to download video ${job.id}: ${errorMessage(error)}`, { cause: error });
    }

    const filePath = join(this.config.tempDir, `generated_${toFileTimestamp(this.clock())}.mp4`);
    try {
      await mkdir(this.config.tempDir, { recursive: true });
      await writeFile(filePath, content);
    } catch (error) {
      throw new ResourceError(`Could not write generated video to ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await assertNonEmptyFile(filePath, 'Generated video');
    console.log(`[Generator] Video saved: ${filePath}`);
    return filePath;
  }
}
