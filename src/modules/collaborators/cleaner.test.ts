import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExternalServiceError, ResourceError } from '../workflow/errors.js';
import {
  EnhancerStrategy,
  FfmpegCropStrategy,
  StrategyCleaner,
  buildCropArgs,
  fillCommand,
  parseFfmpegDuration,
  parseFfmpegTime,
  splitCommand,
  type CleaningStrategy,
} from './cleaner.js';
import type { CommandResult, CommandRunner } from './shell.js';

const NOW = new Date(2025, 0, 6, 9, 0, 0);
const clock = () => NOW;

function ok(stdout = ''): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

function strategy(name: string, run: CleaningStrategy['run'], available = true): CleaningStrategy {
  return { name, isAvailable: async () => available, run };
}

const writesOutput: CleaningStrategy['run'] = async (_input, output) => {
  await writeFile(output, 'cleaned');
};

describe('cleaner', () => {
  let dir: string;
  let inputPath: string;
  let outputDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), 'cleaner-test-'));
    inputPath = join(dir, 'generated.mp4');
    outputDir = join(dir, 'output');
    await writeFile(inputPath, 'raw video');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('StrategyCleaner', () => {
    it('should use the first available strategy that succeeds', async () => {
      const skipped = strategy('enhancer', vi.fn(), false);
      const cleaner = new StrategyCleaner({
        strategies: [skipped, strategy('ffmpeg-crop', writesOutput)],
        outputDir,
        clock,
      });

      const result = await cleaner.clean(inputPath);

      expect(result).toEqual({
        filePath: join(outputDir, 'cleaned_20250106_090000.mp4'),
        strategy: 'ffmpeg-crop',
      });
      expect(skipped.run).not.toHaveBeenCalled();
      expect(await readFile(result.filePath, 'utf8')).toBe('cleaned');
      expect(existsSync(inputPath)).toBe(false);
    });

    it('should fall back when a strategy fails', async () => {
      const failing = strategy('enhancer', async () => {
        throw new Error('model weights missing');
      });
      const cleaner = new StrategyCleaner({
        strategies: [failing, strategy('ffmpeg-crop', writesOutput)],
        outputDir,
        clock,
      });

      await expect(cleaner.clean(inputPath)).resolves.toMatchObject({ strategy: 'ffmpeg-crop' });
      expect(console.error).toHaveBeenCalledWith('[Cleaner] enhancer: model weights missing');
    });

    it('should treat an empty output file as a failure', async () => {
      const empty = strategy('enhancer', async (_input, output) => {
        await writeFile(output, '');
      });
      const cleaner = new StrategyCleaner({ strategies: [empty], outputDir, clock });

      const result = cleaner.clean(inputPath);

      await expect(result).rejects.toBeInstanceOf(ExternalServiceError);
      await expect(result).rejects.toThrow(
        `Video cleaning failed (enhancer: enhancer output is empty: ${join(outputDir, 'cleaned_20250106_090000.mp4')})`
      );
    });

    it('should report the last failure when every strategy fails', async () => {
      const cleaner = new StrategyCleaner({
        strategies: [
          strategy('enhancer', async () => {
            throw new Error('first');
          }),
          strategy('ffmpeg-crop', async () => {
            throw new Error('ffmpeg exited with code 1: Invalid data found');
          }),
        ],
        outputDir,
        clock,
      });

      await expect(cleaner.clean(inputPath)).rejects.toThrow(
        'Video cleaning failed (ffmpeg-crop: ffmpeg exited with code 1: Invalid data found)'
      );
      expect(await readFile(inputPath, 'utf8')).toBe('raw video');
    });

    it('should fail when no strategy is available', async () => {
      const broken: CleaningStrategy = {
        name: 'enhancer',
        isAvailable: async () => {
          throw new Error('probe crashed');
        },
        run: writesOutput,
      };
      const cleaner = new StrategyCleaner({
        strategies: [broken, strategy('ffmpeg-crop', writesOutput, false)],
        outputDir,
        clock,
      });

      await expect(cleaner.clean(inputPath)).rejects.toThrow('Video cleaning failed: no cleaning strategy available');
    });

    it('should reject a missing input before trying any strategy', async () => {
      const run = vi.fn(writesOutput);
      const cleaner = new StrategyCleaner({ strategies: [strategy('ffmpeg-crop', run)], outputDir, clock });
      const missing = join(dir, 'missing.mp4');

      const result = cleaner.clean(missing);

      await expect(result).rejects.toBeInstanceOf(ResourceError);
      await expect(result).rejects.toThrow(`Input video not found: ${missing}`);
      expect(run).not.toHaveBeenCalled();
    });
  });

  describe('command templates', () => {
    it('should keep quoted segments whole', () => {
      expect(splitCommand(`eraser --model "big model" --mode 'fast'`)).toEqual([
        'eraser',
        '--model',
        'big model',
        '--mode',
        'fast',
      ]);
    });

    it('should fill in the input and output paths', () => {
      expect(fillCommand('eraser --in "{input}" --out {output}', '/videos/in file.mp4', '/videos/out.mp4')).toEqual([
        'eraser',
        '--in',
        '/videos/in file.mp4',
        '--out',
        '/videos/out.mp4',
      ]);
    });
  });

  describe('EnhancerStrategy', () => {
    // Writes the path following --out, like the real tools do
    const writingRunner = () =>
      vi.fn<CommandRunner>(async (_bin, args) => {
        const output = args[args.indexOf('--out') + 1];
        await writeFile(output, 'processed');
        return ok();
      });

    it('should be unavailable without an erase command', async () => {
      const probe = vi.fn(async () => true);
      const enhancer = new EnhancerStrategy({ tempDir: dir, probe });

      await expect(enhancer.isAvailable()).resolves.toBe(false);
      expect(probe).not.toHaveBeenCalled();
    });

    it('should probe every configured binary', async () => {
      const probe = vi.fn(async (name: string) => name === 'eraser');
      const enhancer = new EnhancerStrategy({
        eraseCommand: 'eraser --in {input} --out {output}',
        enhanceCommand: 'upscaler --in {input} --out {output}',
        tempDir: dir,
        probe,
      });

      await expect(enhancer.isAvailable()).resolves.toBe(false);
      expect(probe.mock.calls).toEqual([['eraser'], ['upscaler']]);
    });

    it('should erase straight into the output without an enhance pass', async () => {
      const run = writingRunner();
      const onProgress = vi.fn();
      const outputPath = join(dir, 'cleaned.mp4');
      const enhancer = new EnhancerStrategy({
        eraseCommand: 'eraser --in {input} --out {output}',
        tempDir: dir,
        run,
      });

      await enhancer.run(inputPath, outputPath, onProgress);

      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith('eraser', ['--in', inputPath, '--out', outputPath], { timeoutMs: undefined });
      expect(onProgress).toHaveBeenCalledWith(30, 'erasing watermark');
      expect(await readFile(outputPath, 'utf8')).toBe('processed');
    });

    it('should enhance the erased copy and remove it afterwards', async () => {
      const run = writingRunner();
      const outputPath = join(dir, 'cleaned.mp4');
      const erasedPath = join(dir, 'tmp', 'erased_20250106_090000.mp4');
      const enhancer = new EnhancerStrategy({
        eraseCommand: 'eraser --in {input} --out {output}',
        enhanceCommand: 'upscaler --in {input} --out {output}',
        tempDir: join(dir, 'tmp'),
        timeoutMs: 60_000,
        run,
        clock,
      });

      await enhancer.run(inputPath, outputPath);

      expect(run.mock.calls.map(([bin, args]) => [bin, ...args])).toEqual([
        ['eraser', '--in', inputPath, '--out', erasedPath],
        ['upscaler', '--in', erasedPath, '--out', outputPath],
      ]);
      expect(existsSync(erasedPath)).toBe(false);
      expect(existsSync(outputPath)).toBe(true);
    });

    it('should fail with the tail of stderr on a nonzero exit', async () => {
      const run = vi.fn<CommandRunner>(async () => ({ stdout: '', stderr: '\nunsupported codec\n', exitCode: 2 }));
      const enhancer = new EnhancerStrategy({
        eraseCommand: 'eraser --in {input} --out {output}',
        tempDir: dir,
        run,
      });

      await expect(enhancer.run(inputPath, join(dir, 'cleaned.mp4'))).rejects.toThrow(
        'watermark erase exited with code 2: unsupported codec'
      );
    });
  });

  describe('ffmpeg helpers', () => {
    it('should build crop arguments for each encoder', () => {
      expect(buildCropArgs('in.mp4', 'out.mp4', 'libx264')).toEqual([
        '-hide_banner', '-y', '-i', 'in.mp4', '-vf', 'crop=iw*0.9:ih*0.9:0:0',
        '-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-profile:v', 'high',
        '-c:a', 'copy', 'out.mp4',
      ]);
      expect(buildCropArgs('in.mp4', 'out.mp4', 'h264_nvenc')).toEqual([
        '-hide_banner', '-y', '-hwaccel', 'cuda', '-i', 'in.mp4', '-vf', 'crop=iw*0.9:ih*0.9:0:0',
        '-c:v', 'h264_nvenc', '-preset', 'p7', '-rc', 'vbr', '-cq', '19', '-b:v', '5M', '-profile:v', 'high',
        '-c:a', 'copy', 'out.mp4',
      ]);
      expect(buildCropArgs('in.mp4', 'out.mp4', null)).toEqual([
        '-hide_banner', '-y', '-i', 'in.mp4', '-vf', 'crop=iw*0.9:ih*0.9:0:0', '-c:a', 'copy', 'out.mp4',
      ]);
    });

    it('should read duration and position from ffmpeg output', () => {
      expect(parseFfmpegDuration('  Duration: 00:00:12.50, start: 0.000000, bitrate: 1200 kb/s')).toBe(12.5);
      expect(parseFfmpegDuration('  Duration: 01:02:03.00, start: 0.000000')).toBe(3723);
      expect(parseFfmpegTime('frame=  150 fps= 30 q=28.0 size=512kB time=00:00:06.25 bitrate=671.1kbits/s')).toBe(6.25);
      expect(parseFfmpegDuration('Stream #0:0: Video: h264')).toBeNull();
      expect(parseFfmpegTime('Press [q] to stop')).toBeNull();
    });
  });

  describe('FfmpegCropStrategy', () => {
    function fakeFfmpeg(options: { encoders: string; gpu: boolean; stderr?: string[]; exitCode?: number }) {
      return vi.fn<CommandRunner>(async (bin, args, runOptions) => {
        if (bin === 'nvidia-smi') {
          return { stdout: '', stderr: '', exitCode: options.gpu ? 0 : 127 };
        }
        if (args.includes('-encoders')) {
          return ok(options.encoders);
        }
        for (const line of options.stderr ?? []) {
          runOptions?.onStderrLine?.(line);
        }
        return { stdout: '', stderr: (options.stderr ?? []).join('\n'), exitCode: options.exitCode ?? 0 };
      });
    }

    const BOTH_ENCODERS = ' V....D h264_nvenc  NVIDIA NVENC H.264 encoder\n V....D libx264  libx264 H.264';

    it('should prefer NVENC when a GPU is present', async () => {
      const crop = new FfmpegCropStrategy({ run: fakeFfmpeg({ encoders: BOTH_ENCODERS, gpu: true }) });

      await expect(crop.selectEncoder()).resolves.toBe('h264_nvenc');
    });

    it('should use libx264 without a GPU', async () => {
      const crop = new FfmpegCropStrategy({ run: fakeFfmpeg({ encoders: BOTH_ENCODERS, gpu: false }) });

      await expect(crop.selectEncoder()).resolves.toBe('libx264');
    });

    it('should leave the codec to ffmpeg when neither encoder is built in', async () => {
      const crop = new FfmpegCropStrategy({ run: fakeFfmpeg({ encoders: ' V....D mpeg4', gpu: true }) });

      await expect(crop.selectEncoder()).resolves.toBeNull();
    });

    it('should detect the encoder once', async () => {
      const run = fakeFfmpeg({ encoders: BOTH_ENCODERS, gpu: false });
      const crop = new FfmpegCropStrategy({ run });

      await crop.selectEncoder();
      await crop.selectEncoder();

      expect(run.mock.calls.filter(([, args]) => args.includes('-encoders'))).toHaveLength(1);
    });

    it('should report progress from ffmpeg stderr', async () => {
      const run = fakeFfmpeg({
        encoders: BOTH_ENCODERS,
        gpu: false,
        stderr: [
          '  Duration: 00:00:10.00, start: 0.000000, bitrate: 900 kb/s',
          'frame=   75 fps= 25 q=28.0 size=256kB time=00:00:05.00 bitrate=419.4kbits/s',
          'frame=  300 fps= 25 q=28.0 size=900kB time=00:00:10.00 bitrate=737.3kbits/s',
        ],
      });
      const onProgress = vi.fn();
      const crop = new FfmpegCropStrategy({ run });

      await crop.run('in.mp4', 'out.mp4', onProgress);

      expect(onProgress.mock.calls).toEqual([
        [50, 'cropping watermark'],
        [99, 'cropping watermark'],
      ]);
      expect(run).toHaveBeenLastCalledWith('ffmpeg', buildCropArgs('in.mp4', 'out.mp4', 'libx264'), {
        timeoutMs: undefined,
        onStderrLine: expect.any(Function),
      });
    });

    it('should fail on a nonzero exit', async () => {
      const crop = new FfmpegCropStrategy({
        run: fakeFfmpeg({ encoders: '', gpu: false, stderr: ['in.mp4: Invalid data found when processing input'], exitCode: 1 }),
      });

      await expect(crop.run('in.mp4', 'out.mp4')).rejects.toThrow(
        'ffmpeg exited with code 1: in.mp4: Invalid data found when processing input'
      );
    });

    it('should probe for the ffmpeg binary', async () => {
      const probe = vi.fn(async () => true);
      const crop = new FfmpegCropStrategy({ ffmpegPath: '/opt/ffmpeg/bin/ffmpeg', probe });

      await expect(crop.isAvailable()).resolves.toBe(true);
      expect(probe).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg');
    });
  });
});
