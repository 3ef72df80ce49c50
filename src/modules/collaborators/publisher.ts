/**
 * YouTube Publisher
 *
 * Uploads the cleaned video with the YouTube Data API v3, authenticating
 * with an OAuth2 refresh token.
 */

import { createReadStream } from 'node:fs';
import { google } from 'googleapis';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../workflow/errors.js';
import type { ProgressReporter, PublishRequest, PublishedVideo, Publisher } from '../workflow/types.js';
import { assertNonEmptyFile } from './files.js';

/** People & Blogs */
export const DEFAULT_CATEGORY_ID = '22';

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

// =============================================================================
// UPLOAD API
// =============================================================================

export interface VideoUpload {
  filePath: string;
  title: string;
  description: string;
  tags: string[];
  categoryId: string;
  privacyStatus: PublishRequest['privacy'];
}

/**
 * The part of the YouTube API the publisher calls
 */
export interface VideoUploadApi {
  insert(upload: VideoUpload, onBytesRead?: (bytesRead: number) => void): Promise<{ id?: string | null }>;
}

export interface YouTubeCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export function createYouTubeUploadApi(credentials: YouTubeCredentials): VideoUploadApi {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });
  const youtube = google.youtube({ version: 'v3', auth });

  return {
    async insert(upload, onBytesRead) {
      const response = await youtube.videos.insert(
        {
          part: ['snippet', 'status'],
          requestBody: {
            snippet: {
              title: upload.title,
              description: upload.description,
              tags: upload.tags,
              categoryId: upload.categoryId,
            },
            status: {
              privacyStatus: upload.privacyStatus,
              selfDeclaredMadeForKids: false,
            },
          },
          media: {
            body: createReadStream(upload.filePath),
          },
        },
        {
          onUploadProgress: (event: { bytesRead: number }) => onBytesRead?.(event.bytesRead),
        }
      );
      return { id: response.data.id };
    },
  };
}

// =============================================================================
// PUBLISHER
// =============================================================================

export interface YouTubePublisherConfig {
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  categoryId?: string;
  /** Replaces the googleapis client, e.g. in tests */
  api?: VideoUploadApi;
}

export class YouTubePublisher implements Publisher {
  private api: VideoUploadApi | null;

  constructor(private readonly config: YouTubePublisherConfig) {
    this.api = config.api ?? null;
  }

  private getApi(): VideoUploadApi {
    if (!this.api) {
      const { clientId, clientSecret, refreshToken } = this.config;
      if (!clientId || !clientSecret || !refreshToken) {
        throw new ConfigurationError(
          'YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN are required for publishing'
        );
      }
      this.api = createYouTubeUploadApi({ clientId, clientSecret, refreshToken });
    }
    return this.api;
  }

  async publish(request: PublishRequest, onProgress?: ProgressReporter): Promise<PublishedVideo> {
    const api = this.getApi();
    const fileSize = await assertNonEmptyFile(request.filePath, 'Video file');

    console.log(`[Publisher] Uploading "${request.title}" (${request.privacy})`);

    let response: { id?: string | null };
    try {
      response = await api.insert(
        {
          filePath: request.filePath,
          title: request.title,
          description: request.description,
          tags: request.tags,
          categoryId: this.config.categoryId ?? DEFAULT_CATEGORY_ID,
          privacyStatus: request.privacy,
        },
        (bytesRead) => onProgress?.((bytesRead / fileSize) * 100, 'uploading')
      );
    } catch (error) {
      throw new ExternalServiceError(`YouTube API error: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.id) {
      throw new ExternalServiceError('YouTube upload returned no video id');
    }

    const url = watchUrl(response.id);
    console.log(`[Publisher] Video uploaded: ${url}`);
    return { identifier: response.id, url };
  }
}
