/**
 * Content Planner
 *
 * Uses Claude to turn the agent instructions into a video prompt, then asks
 * for YouTube metadata (title, description, tags) describing that prompt.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../workflow/errors.js';
import type { ContentPlan, Planner } from '../workflow/types.js';

// =============================================================================
// TEXT MODEL
// =============================================================================

/**
 * Single-turn text completion
 */
export interface TextModel {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * TextModel backed by the Anthropic messages API
 */
export function createAnthropicTextModel(apiKey: string, model: string): TextModel {
  const client = new Anthropic({ apiKey });

  return {
    async complete(prompt, maxTokens) {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });

      // Extract text from response
      const textContent = response.content.find((c) => c.type === 'text');
      if (textContent && textContent.type === 'text') {
        return textContent.text;
      }
      return '';
    },
  };
}

// =============================================================================
// TEXT HELPERS
// =============================================================================

export const MAX_TITLE_LENGTH = 100;

const PICTOGRAPHIC = /[\p{Extended_Pictographic}\p{Regional_Indicator}\u{FE0F}\u{200D}]/gu;

/**
 * Strip emoji and other pictographic characters
 */
export function sanitizeText(text: string): string {
  return text.replace(PICTOGRAPHIC, '').replace(/ {2,}/g, ' ').trim();
}

/**
 * Pull a JSON object out of a reply that may wrap it in a code fence
 */
export function extractJson(reply: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(reply);
  const body = fenced ? fenced[1] : reply;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  return start >= 0 && end > start ? body.slice(start, end + 1) : body.trim();
}

const metadataSchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
});

export type VideoMetadata = Pick<ContentPlan, 'title' | 'description' | 'tags'>;

export function fallbackMetadata(promptText: string): VideoMetadata {
  return {
    title: 'AI Generated Video',
    description: `Video generated using AI: ${promptText}`,
    tags: ['AI', 'Generated', 'Video'],
  };
}

/**
 * Parse the metadata reply. Returns null when it is not JSON of the
 * expected shape.
 */
export function parseMetadata(reply: string): VideoMetadata | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(reply));
  } catch {
    return null;
  }

  const result = metadataSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }

  // Cut on code points so a surrogate pair is never split
  const title = Array.from(sanitizeText(result.data.title)).slice(0, MAX_TITLE_LENGTH).join('').trim();
  if (!title) {
    return null;
  }

  return {
    title,
    description: sanitizeText(result.data.description),
    tags: result.data.tags.map(sanitizeText).filter((tag) => tag.length > 0),
  };
}

// =============================================================================
// PROMPTS
// =============================================================================

function videoPromptRequest(instructions: string): string {
  return `You are generating a creative prompt for an AI video generation model.

Custom instructions: ${instructions}

Write a single, detailed video prompt that:
1. Is engaging and suitable for YouTube
2. Is visually interesting and cinematic
3. Has a clear narrative or visual progression
4. Avoids copyright issues and controversial content

Return ONLY the video prompt, nothing else.`;
}

function metadataRequest(promptText: string): string {
  return `Create YouTube metadata for a video made from this prompt:

${promptText}

Reply with JSON only, in this shape:
{"title": "engaging, accurate title (max ${MAX_TITLE_LENGTH} characters)", "description": "description with relevant keywords", "tags": ["tag1", "tag2", "tag3"]}

Choose 5-10 relevant tags.`;
}

// =============================================================================
// PLANNER
// =============================================================================

export interface ClaudeContentPlannerConfig {
  apiKey?: string;
  model: string;
  /** Replaces the Anthropic client, e.g. in tests */
  textModel?: TextModel;
}

export class ClaudeContentPlanner implements Planner {
  private textModel: TextModel | null;

  constructor(private readonly config: ClaudeContentPlannerConfig) {
    this.textModel = config.textModel ?? null;
  }

  /**
   * Get the text model lazily, so a missing key only fails the plan step
   */
  private getModel(): TextModel {
    if (!this.textModel) {
      if (!this.config.apiKey) {
        throw new ConfigurationError('ANTHROPIC_API_KEY is required for content planning');
      }
      this.textModel = createAnthropicTextModel(this.config.apiKey, this.config.model);
    }
    return this.textModel;
  }

  async plan(instructions: string): Promise<ContentPlan> {
    const model = this.getModel();

    let promptReply: string;
    try {
      promptReply = await model.complete(videoPromptRequest(instructions), 1024);
    } catch (error) {
      throw new ExternalServiceError(`Failed to generate video prompt: ${errorMessage(error)}`, { cause: error });
    }

    const promptText = sanitizeText(promptReply);
    if (!promptText) {
      throw new ExternalServiceError('Planner returned an empty video prompt');
    }

    let metadataReply: string;
    try {
      metadataReply = await model.complete(metadataRequest(promptText), 1024);
    } catch (error) {
      throw new ExternalServiceError(`Failed to generate video metadata: ${errorMessage(error)}`, { cause: error });
    }

    let metadata = parseMetadata(metadataReply);
    if (!metadata) {
      console.warn('[Planner] Metadata reply was not valid JSON, using fallback metadata');
      metadata = fallbackMetadata(promptText);
    }

    return { promptText, ...metadata };
  }
}
