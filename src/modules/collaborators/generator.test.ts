import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ConfigurationError, ExternalServiceError, ResourceError } from '../workflow/errors.js';
import { SoraVideoGenerator, pickSeconds, sizeFor, type VideoApi, type VideoJob } from './generator.js';

const PROMPT = 'A paper boat drifting down a rain-soaked city street at dusk';
const NOW = new Date(2025, 0, 6, 9, 0, 0);

/**
 * VideoApi that walks through a fixed list of job states
 */
function scriptedApi(states: VideoJob[], content: Uint8Array = new TextEncoder().encode('mp4 bytes')) {
  const [first, ...rest] = states;
  return {
    create: vi.fn<VideoApi['create']>(async () => first),
    retrieve: vi.fn<VideoApi['retrieve']>(async () => {
      const next = rest.shift();
      if (!next) throw new Error('no scripted job state left');
      return next;
    }),
    download: vi.fn<VideoApi['download']>(async () => content),
  };
}

describe('video generator', () => {
  it('should pick the shortest clip that covers the duration', () => {
    expect(pickSeconds(3)).toBe('4');
    expect(pickSeconds(4)).toBe('4');
    expect(pickSeconds(5)).toBe('8');
    expect(pickSeconds(8)).toBe('8');
    expect(pickSeconds(30)).toBe('12');
  });

  it('should map resolutions to landscape sizes', () => {
    expect(sizeFor('1080p')).toBe('1792x1024');
    expect(sizeFor('720p')).toBe('1280x720');
  });

  describe('SoraVideoGenerator', () => {
    let tempDir: string;
    let sleep: Mock<(ms: number) => Promise<void>>;

    beforeEach(async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
      tempDir = await mkdtemp(join(tmpdir(), 'generator-test-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    function createGenerator(api: VideoApi, maxPolls?: number): SoraVideoGenerator {
      return new SoraVideoGenerator({
        model: 'sora-2',
        tempDir: join(tempDir, 'videos'),
        pollIntervalMs: 5000,
        maxPolls,
        api,
        sleep,
        clock: () => NOW,
      });
    }

    it('should poll until the job completes and save the download', async () => {
      const api = scriptedApi([
        { id: 'video_1', status: 'queued', progress: 0 },
        { id: 'video_1', status: 'in_progress', progress: 40 },
        { id: 'video_1', status: 'completed', progress: 100 },
      ]);
      const onProgress = vi.fn();

      const filePath = await createGenerator(api).generate(PROMPT, 10, '720p', onProgress);

      expect(filePath).toBe(join(tempDir, 'videos', 'generated_20250106_090000.mp4'));
      expect(await readFile(filePath, 'utf8')).toBe('mp4 bytes');
      expect(api.create).toHaveBeenCalledWith({ prompt: PROMPT, model: 'sora-2', seconds: '12', size: '1280x720' });
      expect(api.download).toHaveBeenCalledWith('video_1');
      expect(onProgress.mock.calls).toEqual([[40, 'rendering video']]);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(5000);
    });

    it('should report a queued job', async () => {
      const api = scriptedApi([
        { id: 'video_2', status: 'queued' },
        { id: 'video_2', status: 'queued', progress: null },
        { id: 'video_2', status: 'completed' },
      ]);
      const onProgress = vi.fn();

      await createGenerator(api).generate(PROMPT, 4, '1080p', onProgress);

      expect(onProgress.mock.calls).toEqual([[0, 'queued']]);
    });

    it('should require an API key', async () => {
      const generator = new SoraVideoGenerator({ model: 'sora-2', tempDir });

      const result = generator.generate(PROMPT, 8, '1080p');

      await expect(result).rejects.toBeInstanceOf(ConfigurationError);
      await expect(result).rejects.toThrow('OPENAI_API_KEY is required for video generation');
    });

    it('should surface the job error when rendering fails', async () => {
      const api = scriptedApi([
        { id: 'video_3', status: 'in_progress', progress: 10 },
        { id: 'video_3', status: 'failed', error: { message: 'prompt rejected by moderation' } },
      ]);

      const result = createGenerator(api).generate(PROMPT, 8, '1080p');

      await expect(result).rejects.toBeInstanceOf(ExternalServiceError);
      await expect(result).rejects.toThrow('Video generation failed: prompt rejected by moderation');
      expect(api.download).not.toHaveBeenCalled();
    });

    it('should give up after the poll limit', async () => {
      const api = scriptedApi([
        { id: 'video_4', status: 'queued' },
        { id: 'video_4', status: 'in_progress', progress: 5 },
        { id: 'video_4', status: 'in_progress', progress: 6 },
      ]);

      await expect(createGenerator(api, 2).generate(PROMPT, 8, '1080p')).rejects.toThrow(
        'Video generation timed out (job video_4 still in_progress)'
      );
      expect(api.retrieve).toHaveBeenCalledTimes(2);
    });

    it('should wrap a rejected create call', async () => {
      const api = scriptedApi([{ id: 'unused', status: 'queued' }]);
      api.create.mockRejectedValueOnce(new Error('401 invalid api key'));

      await expect(createGenerator(api).generate(PROMPT, 8, '1080p')).rejects.toThrow(
        'Failed to start video generation: 401 invalid api key'
      );
    });

    it('should reject an empty download', async () => {
      const api = scriptedApi([{ id: 'video_5', status: 'completed' }], new Uint8Array());

      const result = createGenerator(api).generate(PROMPT, 8, '1080p');

      await expect(result).rejects.toBeInstanceOf(ResourceError);
      await expect(result).rejects.toThrow(
        `Generated video is empty: ${join(tempDir, 'videos', 'generated_20250106_090000.mp4')}`
      );
    });
  });
});
