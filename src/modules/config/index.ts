/**
 * Config Module
 *
 * Environment configuration (credentials, paths, scheduler switches) and the
 * persisted workflow settings edited through the API.
 */

export { loadConfig, type AppConfig } from './env.js';

export {
  SETTING_KEYS,
  SETTING_DESCRIPTIONS,
  DEFAULT_AGENT_INSTRUCTIONS,
  DEFAULT_WORKFLOW_SETTINGS,
  agentInstructionsSchema,
  videoDurationSchema,
  videoResolutionSchema,
  privacyStatusSchema,
  PostgresSettingsStore,
  loadWorkflowSettings,
  loadWeeklySchedule,
  type SettingsStore,
} from './settings.js';
