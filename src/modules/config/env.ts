/**
 * Process configuration from environment variables.
 *
 * Credentials are optional here: a missing key only fails the step that
 * needs it, with a ConfigurationError.
 */

import { z } from 'zod';
import cron from 'node-cron';

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * Scheduled minutes are matched exactly, so the poll tick has to land in
 * every minute: `* * * * *`, or a seconds field followed by five wildcards.
 */
function ticksEveryMinute(expression: string): boolean {
  const fields = expression.trim().split(/\s+/);
  const minuteFields = fields.length === 6 ? fields.slice(1) : fields;
  return minuteFields.length === 5 && minuteFields.every((field) => field === '*');
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  SCHEDULER_ENABLED: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() !== 'false'),
  SCHEDULER_POLL_CRON: z
    .string()
    .default('* * * * *')
    .superRefine((expression, ctx) => {
      if (!cron.validate(expression)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid cron expression' });
      } else if (!ticksEveryMinute(expression)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Poll expression must tick at least once a minute' });
      }
    }),
  ANTHROPIC_API_KEY: optionalString,
  PLANNER_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  OPENAI_API_KEY: optionalString,
  VIDEO_MODEL: z.enum(['sora-2', 'sora-2-pro']).default('sora-2'),
  YOUTUBE_CLIENT_ID: optionalString,
  YOUTUBE_CLIENT_SECRET: optionalString,
  YOUTUBE_REFRESH_TOKEN: optionalString,
  OUTPUT_DIR: z.string().min(1).default('output'),
  TEMP_DIR: z.string().min(1).default('temp'),
  WATERMARK_ERASE_COMMAND: optionalString,
  VIDEO_ENHANCE_COMMAND: optionalString,
});

/**
 * Validated application configuration
 */
export interface AppConfig {
  port: number;
  nodeEnv: string;
  scheduler: {
    enabled: boolean;
    pollExpression: string;
  };
  planner: {
    apiKey?: string;
    model: string;
  };
  generator: {
    apiKey?: string;
    model: 'sora-2' | 'sora-2-pro';
  };
  publisher: {
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
  };
  paths: {
    outputDir: string;
    tempDir: string;
  };
  cleaner: {
    eraseCommand?: string;
    enhanceCommand?: string;
  };
}

/**
 * Parse and validate configuration. Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    const errorMessages = parseResult.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid configuration: ${errorMessages.join('; ')}`);
  }

  const parsed = parseResult.data;
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    scheduler: {
      enabled: parsed.SCHEDULER_ENABLED,
      pollExpression: parsed.SCHEDULER_POLL_CRON,
    },
    planner: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      model: parsed.PLANNER_MODEL,
    },
    generator: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.VIDEO_MODEL,
    },
    publisher: {
      clientId: parsed.YOUTUBE_CLIENT_ID,
      clientSecret: parsed.YOUTUBE_CLIENT_SECRET,
      refreshToken: parsed.YOUTUBE_REFRESH_TOKEN,
    },
    paths: {
      outputDir: parsed.OUTPUT_DIR,
      tempDir: parsed.TEMP_DIR,
    },
    cleaner: {
      eraseCommand: parsed.WATERMARK_ERASE_COMMAND,
      enhanceCommand: parsed.VIDEO_ENHANCE_COMMAND,
    },
  };
}
