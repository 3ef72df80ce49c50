/**
 * Workflow Settings
 *
 * Persisted in the settings table as key/value rows. Each run reads them
 * fresh, so edits made through the API apply to the next run.
 */

import { z } from 'zod';
import { getAllSettings, setSetting } from '../database/index.js';
import { weeklyScheduleSchema, type WeeklySchedule } from '../scheduler/schedule-table.js';
import { ConfigurationError } from '../workflow/errors.js';
import type { WorkflowSettings } from '../workflow/types.js';

/**
 * Setting keys as stored in the settings table
 */
export const SETTING_KEYS = {
  weeklySchedule: 'weekly_schedule',
  agentInstructions: 'agent_instructions',
  videoDuration: 'video_duration',
  videoResolution: 'video_resolution',
  privacyStatus: 'privacy_status',
} as const;

export const SETTING_DESCRIPTIONS: Record<string, string> = {
  [SETTING_KEYS.weeklySchedule]: 'Publish time per weekday, e.g. {"Monday": "09:00"}. Local time of the server.',
  [SETTING_KEYS.agentInstructions]: 'Instructions given to the planner when it writes the video prompt.',
  [SETTING_KEYS.videoDuration]: 'Requested video length in seconds.',
  [SETTING_KEYS.videoResolution]: 'Requested video resolution (1080p or 720p).',
  [SETTING_KEYS.privacyStatus]: 'Privacy of uploaded videos (public, unlisted or private).',
};

export const DEFAULT_AGENT_INSTRUCTIONS =
  'Generate engaging, high-quality videos suitable for YouTube. Focus on trending topics, ' +
  'educational content, or entertainment. Keep videos between 30-60 seconds.';

export const DEFAULT_WORKFLOW_SETTINGS: WorkflowSettings = {
  agentInstructions: DEFAULT_AGENT_INSTRUCTIONS,
  videoDurationSeconds: 30,
  videoResolution: '1080p',
  privacyStatus: 'public',
};

export const agentInstructionsSchema = z.string().max(4000);
export const videoDurationSchema = z.number().int().min(1).max(600);
export const videoResolutionSchema = z.enum(['1080p', '720p']);
export const privacyStatusSchema = z.enum(['public', 'unlisted', 'private']);

/**
 * Key/value access to persisted settings
 */
export interface SettingsStore {
  getAll(): Promise<Record<string, unknown>>;
  set(key: string, value: unknown, description?: string): Promise<void>;
}

export class PostgresSettingsStore implements SettingsStore {
  async getAll(): Promise<Record<string, unknown>> {
    const settingsList = await getAllSettings();

    // Transform to key-value pairs
    const result: Record<string, unknown> = {};
    for (const setting of settingsList) {
      result[setting.key] = setting.value;
    }
    return result;
  }

  async set(key: string, value: unknown, description?: string): Promise<void> {
    await setSetting(key, value, description ?? SETTING_DESCRIPTIONS[key]);
  }
}

function readSetting<T>(
  stored: Record<string, unknown>,
  key: string,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const value = stored[key];
  if (value === undefined || value === null) {
    return fallback;
  }

  const parseResult = schema.safeParse(value);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((e) => e.message).join('; ');
    throw new ConfigurationError(`Invalid setting ${key}: ${issues}`);
  }
  return parseResult.data;
}

/**
 * Stored settings merged over defaults. Invalid stored values are a
 * ConfigurationError.
 */
export async function loadWorkflowSettings(store: SettingsStore): Promise<WorkflowSettings> {
  const stored = await store.getAll();
  const defaults = DEFAULT_WORKFLOW_SETTINGS;

  return {
    agentInstructions: readSetting(
      stored,
      SETTING_KEYS.agentInstructions,
      agentInstructionsSchema,
      defaults.agentInstructions
    ),
    videoDurationSeconds: readSetting(
      stored,
      SETTING_KEYS.videoDuration,
      videoDurationSchema,
      defaults.videoDurationSeconds
    ),
    videoResolution: readSetting(
      stored,
      SETTING_KEYS.videoResolution,
      videoResolutionSchema,
      defaults.videoResolution
    ),
    privacyStatus: readSetting(stored, SETTING_KEYS.privacyStatus, privacyStatusSchema, defaults.privacyStatus),
  };
}

/**
 * Stored weekly schedule, or an empty one
 */
export async function loadWeeklySchedule(store: SettingsStore): Promise<WeeklySchedule> {
  const stored = await store.getAll();
  return readSetting(stored, SETTING_KEYS.weeklySchedule, weeklyScheduleSchema, {});
}
