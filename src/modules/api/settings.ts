import { Router } from 'express';
import { DEFAULT_WORKFLOW_SETTINGS, SETTING_KEYS, type SettingsStore } from '../config/settings.js';
import type { ApiServices } from './services.js';
import {
  asyncHandler,
  updateSettingsBodySchema,
  validationError,
  type SettingsResponse,
} from './types.js';

/**
 * Stored settings over their defaults
 */
async function effectiveSettings(store: SettingsStore): Promise<SettingsResponse> {
  const stored = await store.getAll();
  return {
    [SETTING_KEYS.weeklySchedule]: {},
    [SETTING_KEYS.agentInstructions]: DEFAULT_WORKFLOW_SETTINGS.agentInstructions,
    [SETTING_KEYS.videoDuration]: DEFAULT_WORKFLOW_SETTINGS.videoDurationSeconds,
    [SETTING_KEYS.videoResolution]: DEFAULT_WORKFLOW_SETTINGS.videoResolution,
    [SETTING_KEYS.privacyStatus]: DEFAULT_WORKFLOW_SETTINGS.privacyStatus,
    ...stored,
  };
}

export function createSettingsRouter(services: Pick<ApiServices, 'settings' | 'schedule'>): Router {
  const { settings, schedule } = services;
  const router = Router();

  /**
   * GET /api/settings
   *
   * Returns all settings as key-value pairs.
   */
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(await effectiveSettings(settings));
    })
  );

  /**
   * PUT /api/settings
   *
   * Updates settings. Every field is optional:
   * { weekly_schedule?: {"Monday": "09:00", ...}, agent_instructions?: string,
   *   video_duration?: number, video_resolution?: "1080p" | "720p",
   *   privacy_status?: "public" | "unlisted" | "private" }
   *
   * A new weekly_schedule takes effect on the scheduler's next tick.
   */
  router.put(
    '/',
    asyncHandler(async (req, res) => {
      // Validate request body
      const parseResult = updateSettingsBodySchema.safeParse(req.body);
      if (!parseResult.success) {
        throw validationError(parseResult.error);
      }

      const updates = parseResult.data;

      // Update each setting if provided
      if (updates.weekly_schedule !== undefined) {
        await settings.set(SETTING_KEYS.weeklySchedule, updates.weekly_schedule);
        schedule.replace(updates.weekly_schedule);
        console.log('[Settings] Weekly schedule updated');
      }

      if (updates.agent_instructions !== undefined) {
        await settings.set(SETTING_KEYS.agentInstructions, updates.agent_instructions);
      }

      if (updates.video_duration !== undefined) {
        await settings.set(SETTING_KEYS.videoDuration, updates.video_duration);
      }

      if (updates.video_resolution !== undefined) {
        await settings.set(SETTING_KEYS.videoResolution, updates.video_resolution);
      }

      if (updates.privacy_status !== undefined) {
        await settings.set(SETTING_KEYS.privacyStatus, updates.privacy_status);
      }

      // Return updated settings
      res.json(await effectiveSettings(settings));
    })
  );

  return router;
}
