/**
 * Video Cleaner
 *
 * Removes the generator's watermark. Strategies are tried in order:
 * 1. Enhancer: external watermark eraser, then an optional enhancement pass
 * 2. FFmpeg crop: crops the frame edges where the watermark sits
 *
 * Unavailable strategies are skipped and the first success wins. There is no
 * pass-through fallback: when every strategy fails, the step fails and the
 * input stays where it is. After a success the input is deleted.
 */

import { mkdir, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { systemClock, toFileTimestamp, type Clock } from '../../utils/calendar.js';
import { ExternalServiceError, errorMessage } from '../workflow/errors.js';
import type { CleanedVideo, ProgressReporter, VideoCleaner } from '../workflow/types.js';
import { assertNonEmptyFile } from './files.js';
import {
  hasCommand,
  runCommand,
  stderrTail,
  type CommandProbe,
  type CommandRunner,
} from './shell.js';

/**
 * One way of producing a cleaned copy of a video
 */
export interface CleaningStrategy {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  /** Writes the cleaned video to outputPath; throws on failure */
  run(inputPath: string, outputPath: string, onProgress?: ProgressReporter): Promise<void>;
}

// =============================================================================
// STRATEGY CLEANER
// =============================================================================

export interface StrategyCleanerConfig {
  strategies: CleaningStrategy[];
  outputDir: string;
  clock?: Clock;
}

export class StrategyCleaner implements VideoCleaner {
  private readonly clock: Clock;

  constructor(private readonly config: StrategyCleanerConfig) {
    this.clock = config.clock ?? systemClock;
  }

  async clean(inputPath: string, onProgress?: ProgressReporter): Promise<CleanedVideo> {
    await assertNonEmptyFile(inputPath, 'Input video');

    await mkdir(this.config.outputDir, { recursive: true });
    const outputPath = join(this.config.outputDir, `cleaned_${toFileTimestamp(this.clock())}.mp4`);

    let lastFailure: string | null = null;

    for (const strategy of this.config.strategies) {
      if (!(await this.checkAvailable(strategy))) {
        console.log(`[Cleaner] ${strategy.name} not available, skipping`);
        continue;
      }

      console.log(`[Cleaner] Cleaning ${basename(inputPath)} with ${strategy.name}`);
      try {
        await strategy.run(inputPath, outputPath, onProgress);
        await assertNonEmptyFile(outputPath, `${strategy.name} output`);
        console.log(`[Cleaner] Cleaned video written: ${outputPath}`);
        await this.removeInput(inputPath);
        return { filePath: outputPath, strategy: strategy.name };
      } catch (error) {
        lastFailure = `${strategy.name}: ${errorMessage(error)}`;
        console.error(`[Cleaner] ${lastFailure}`);
      }
    }

    throw new ExternalServiceError(
      lastFailure ? `Video cleaning failed (${lastFailure})` : 'Video cleaning failed: no cleaning strategy available'
    );
  }

  /**
   * The generated file is a temp artifact once a cleaned copy exists. A
   * failed delete leaves it behind but does not fail the clean.
   */
  private async removeInput(inputPath: string): Promise<void> {
    try {
      await rm(inputPath, { force: true });
    } catch (error) {
      console.warn(`[Cleaner] Could not remove ${inputPath}:`, error);
    }
  }

  private async checkAvailable(strategy: CleaningStrategy): Promise<boolean> {
    try {
      return await strategy.isAvailable();
    } catch (error) {
      console.error(`[Cleaner] Could not check ${strategy.name}:`, error);
      return false;
    }
  }
}

// =============================================================================
// COMMAND TEMPLATES
// =============================================================================

/**
 * Split a command template into arguments. Quoted segments stay whole.
 */
export function splitCommand(template: string): string[] {
  const tokens = template.match(/"[^"]*"|'[^']*'|\S+/g) ?? [];
  return tokens.map((token) =>
    (token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'"))
      ? token.slice(1, -1)
      : token
  );
}

/**
 * Command template with {input} and {output} filled in
 */
export function fillCommand(template: string, inputPath: string, outputPath: string): string[] {
  return splitCommand(template).map((arg) =>
    arg.replaceAll('{input}', inputPath).replaceAll('{output}', outputPath)
  );
}

// =============================================================================
// ENHANCER STRATEGY
// =============================================================================

export interface EnhancerStrategyConfig {
  /** e.g. "watermark-eraser --input {input} --output {output}" */
  eraseCommand?: string;
  /** Optional second pass, same placeholders */
  enhanceCommand?: string;
  tempDir: string;
  timeoutMs?: number;
  run?: CommandRunner;
  probe?: CommandProbe;
  clock?: Clock;
}

export class EnhancerStrategy implements CleaningStrategy {
  readonly name = 'enhancer';
  private readonly runner: CommandRunner;
  private readonly probe: CommandProbe;
  private readonly clock: Clock;

  constructor(private readonly config: EnhancerStrategyConfig) {
    this.runner = config.run ?? runCommand;
    this.probe = config.probe ?? hasCommand;
    this.clock = config.clock ?? systemClock;
  }

  async isAvailable(): Promise<boolean> {
    const { eraseCommand, enhanceCommand } = this.config;
    if (!eraseCommand) {
      return false;
    }

    const bins = [eraseCommand, enhanceCommand]
      .filter((template): template is string => Boolean(template))
      .map((template) => splitCommand(template)[0]);

    for (const bin of bins) {
      if (!bin || !(await this.probe(bin))) {
        return false;
      }
    }
    return true;
  }

  async run(inputPath: string, outputPath: string, onProgress?: ProgressReporter): Promise<void> {
    const { eraseCommand, enhanceCommand, tempDir } = this.config;
    if (!eraseCommand) {
      throw new Error('no watermark erase command configured');
    }

    let erasedPath = outputPath;
    if (enhanceCommand) {
      await mkdir(tempDir, { recursive: true });
      erasedPath = join(tempDir, `erased_${toFileTimestamp(this.clock())}.mp4`);
    }

    onProgress?.(30, 'erasing watermark');
    await this.exec('watermark erase', fillCommand(eraseCommand, inputPath, erasedPath));

    if (!enhanceCommand) {
      return;
    }

    try {
      onProgress?.(65, 'enhancing video');
      await this.exec('enhancement', fillCommand(enhanceCommand, erasedPath, outputPath));
    } finally {
      await rm(erasedPath, { force: true });
    }
  }

  private async exec(label: string, argv: string[]): Promise<void> {
    const [bin, ...args] = argv;
    if (!bin) {
      throw new Error(`${label} command is empty`);
    }

    const result = await this.runner(bin, args, { timeoutMs: this.config.timeoutMs });
    if (result.exitCode !== 0) {
      throw new Error(`${label} exited with code ${result.exitCode}: ${stderrTail(result.stderr)}`);
    }
  }
}

// =============================================================================
// FFMPEG CROP STRATEGY
// =============================================================================

export type FfmpegEncoder = 'h264_nvenc' | 'libx264';

const CROP_FILTER = 'crop=iw*0.9:ih*0.9:0:0';

const ENCODER_ARGS: Record<FfmpegEncoder, string[]> = {
  h264_nvenc: ['-c:v', 'h264_nvenc', '-preset', 'p7', '-rc', 'vbr', '-cq', '19', '-b:v', '5M', '-profile:v', 'high'],
  libx264: ['-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-profile:v', 'high'],
};

/**
 * ffmpeg arguments for the crop pass. A null encoder leaves the codec to
 * ffmpeg's default.
 */
export function buildCropArgs(inputPath: string, outputPath: string, encoder: FfmpegEncoder | null): string[] {
  return [
    '-hide_banner',
    '-y',
    ...(encoder === 'h264_nvenc' ? ['-hwaccel', 'cuda'] : []),
    '-i',
    inputPath,
    '-vf',
    CROP_FILTER,
    ...(encoder ? ENCODER_ARGS[encoder] : []),
    '-c:a',
    'copy',
    outputPath,
  ];
}

function toSeconds(hours: string, minutes: string, seconds: string): number {
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * Input length from ffmpeg's "Duration: 00:00:12.04, ..." line
 */
export function parseFfmpegDuration(line: string): number | null {
  const match = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(line);
  return match ? toSeconds(match[1], match[2], match[3]) : null;
}

/**
 * Encoded position from a progress line ("... time=00:00:06.02 ...")
 */
export function parseFfmpegTime(line: string): number | null {
  const match = /time=\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(line);
  return match ? toSeconds(match[1], match[2], match[3]) : null;
}

export interface FfmpegCropStrategyConfig {
  ffmpegPath?: string;
  timeoutMs?: number;
  run?: CommandRunner;
  probe?: CommandProbe;
}

export class FfmpegCropStrategy implements CleaningStrategy {
  readonly name = 'ffmpeg-crop';
  private readonly ffmpeg: string;
  private readonly runner: CommandRunner;
  private readonly probe: CommandProbe;
  private encoder: FfmpegEncoder | null | undefined;

  constructor(private readonly config: FfmpegCropStrategyConfig = {}) {
    this.ffmpeg = config.ffmpegPath ?? 'ffmpeg';
    this.runner = config.run ?? runCommand;
    this.probe = config.probe ?? hasCommand;
  }

  isAvailable(): Promise<boolean> {
    return this.probe(this.ffmpeg);
  }

  /**
   * NVENC when an NVIDIA GPU is present and ffmpeg has the encoder, then
   * libx264, then ffmpeg's default. Detected once.
   */
  async selectEncoder(): Promise<FfmpegEncoder | null> {
    if (this.encoder !== undefined) {
      return this.encoder;
    }

    const encoders = await this.listEncoders();
    if (encoders.includes('h264_nvenc') && (await this.hasNvidiaGpu())) {
      this.encoder = 'h264_nvenc';
    } else if (encoders.includes('libx264')) {
      this.encoder = 'libx264';
    } else {
      this.encoder = null;
    }

    console.log(`[Cleaner] Using ${this.encoder ?? 'default'} encoder`);
    return this.encoder;
  }

  async run(inputPath: string, outputPath: string, onProgress?: ProgressReporter): Promise<void> {
    const encoder = await this.selectEncoder();
    const args = buildCropArgs(inputPath, outputPath, encoder);

    let duration: number | null = null;
    const result = await this.runner(this.ffmpeg, args, {
      timeoutMs: this.config.timeoutMs,
      onStderrLine: (line) => {
        if (duration === null) {
          duration = parseFfmpegDuration(line);
        }
        const position = parseFfmpegTime(line);
        if (position !== null && duration) {
          onProgress?.(Math.min(99, (position / duration) * 100), 'cropping watermark');
        }
      },
    });

    if (result.exitCode !== 0) {
      throw new Error(`ffmpeg exited with code ${result.exitCode}: ${stderrTail(result.stderr)}`);
    }
  }

  private async listEncoders(): Promise<string> {
    try {
      const result = await this.runner(this.ffmpeg, ['-hide_banner', '-encoders'], { timeoutMs: 5000 });
      return result.exitCode === 0 ? result.stdout : '';
    } catch (error) {
      console.error('[Cleaner] Could not list ffmpeg encoders:', error);
      return '';
    }
  }

  private async hasNvidiaGpu(): Promise<boolean> {
    try {
      const result = await this.runner('nvidia-smi', [], { timeoutMs: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
