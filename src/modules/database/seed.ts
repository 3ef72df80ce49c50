import 'dotenv/config';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { settings } from './schema.js';
import {
  DEFAULT_WORKFLOW_SETTINGS,
  SETTING_DESCRIPTIONS,
  SETTING_KEYS,
} from '../config/settings.js';

const { Pool } = pg;

/**
 * Default settings for the content pipeline. The weekly schedule starts
 * empty, so nothing is published until a time is set.
 */
const DEFAULT_SETTINGS: Array<{ key: string; value: unknown }> = [
  { key: SETTING_KEYS.weeklySchedule, value: {} },
  { key: SETTING_KEYS.agentInstructions, value: DEFAULT_WORKFLOW_SETTINGS.agentInstructions },
  { key: SETTING_KEYS.videoDuration, value: DEFAULT_WORKFLOW_SETTINGS.videoDurationSeconds },
  { key: SETTING_KEYS.videoResolution, value: DEFAULT_WORKFLOW_SETTINGS.videoResolution },
  { key: SETTING_KEYS.privacyStatus, value: DEFAULT_WORKFLOW_SETTINGS.privacyStatus },
];

/**
 * Seed the settings table with default values. Existing values are kept;
 * only their descriptions are refreshed.
 */
async function seedSettings() {
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  console.log('Connecting to database...');
  const pool = new Pool({ connectionString });
  const db = drizzle(pool);

  try {
    console.log('Seeding settings table...');

    for (const setting of DEFAULT_SETTINGS) {
      const description = SETTING_DESCRIPTIONS[setting.key];
      await db
        .insert(settings)
        .values({
          key: setting.key,
          value: setting.value,
          description,
        })
        .onConflictDoUpdate({
          target: settings.key,
          set: {
            description,
            updatedAt: new Date(),
          },
        });
      console.log(`  - Set ${setting.key}`);
    }

    console.log('\nSettings seeded successfully!');
    console.log('\nDefault configuration:');
    console.log(`  - Video duration: ${DEFAULT_WORKFLOW_SETTINGS.videoDurationSeconds}s`);
    console.log(`  - Video resolution: ${DEFAULT_WORKFLOW_SETTINGS.videoResolution}`);
    console.log(`  - Privacy: ${DEFAULT_WORKFLOW_SETTINGS.privacyStatus}`);
    console.log('  - Weekly schedule: empty (set it with PUT /api/settings)');
  } catch (error) {
    console.error('Seeding failed:', error);
    throw error;
  } finally {
    await pool.end();
  }
}

// Run seeding if this file is executed directly
seedSettings().catch((error) => {
  console.error('Seed script failed:', error);
  process.exit(1);
});
