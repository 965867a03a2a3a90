import { z } from 'zod';
import type { AppStoreRawReview, AppStoreReviewQuery, AppStoreReviewService } from '@shared/types';

const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.3 Safari/605.1.15';

// The storefront page embeds a bearer token for the public catalog API
const TOKEN_PATTERN = /token%22%3A%22(.+?)%22/;
const OFFSET_PATTERN = /offset=(\d+)/;
const REVIEWS_PAGE_SIZE = 20;

const developerResponseSchema = z.object({
  id: z.union([z.number(), z.string()]),
  body: z.string(),
  modified: z.string()
});

const reviewAttributesSchema = z.object({
  date: z.coerce.date(),
  developerResponse: developerResponseSchema.optional(),
  review: z.string(),
  rating: z.number().int().min(1).max(5),
  isEdited: z.boolean(),
  title: z.string(),
  userName: z.string()
});

const reviewsResponseSchema = z.object({
  data: z.array(z.object({ attributes: reviewAttributesSchema })),
  next: z.string().optional()
});

export interface AppStoreClientOptions {
  timeoutMs?: number;
  debugMode?: boolean;
}

/**
 * Reads reviews from the App Store's catalog API, the same source the
 * storefront web page uses.
 */
export class AppStoreApiClient implements AppStoreReviewService {
  private timeoutMs: number;
  private debugMode: boolean;

  constructor(options: AppStoreClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.debugMode = options.debugMode ?? false;
  }

  private log(message: string): void {
    if (this.debugMode) {
      console.log(`[AppStoreApiClient] ${message}`);
    }
  }

  private async fetchWithTimeout(url: string, headers: Record<string, string> = {}): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': USER_AGENT,
          ...headers
        }
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.timeoutMs}ms: ${url}`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async fetchToken(landingUrl: string): Promise<string> {
    const response = await this.fetchWithTimeout(landingUrl);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText} for ${landingUrl}`);
    }

    const match = TOKEN_PATTERN.exec(await response.text());
    if (!match) {
      throw new Error(`No catalog token found on ${landingUrl}`);
    }
    return match[1];
  }

  async fetchReviews(query: AppStoreReviewQuery): Promise<AppStoreRawReview[]> {
    const { country, appName, appId, howMany } = query;
    const landingUrl = `https://apps.apple.com/${country}/app/${appName}/id${appId}`;
    const token = await this.fetchToken(landingUrl);
    const reviews: AppStoreRawReview[] = [];
    let offset: number | null = 0;

    while (offset !== null && reviews.length < howMany) {
      const params = new URLSearchParams({
        l: 'en-GB',
        offset: String(offset),
        limit: String(REVIEWS_PAGE_SIZE),
        platform: 'web',
        additionalPlatforms: 'appletv,ipad,iphone,mac'
      });
      const response = await this.fetchWithTimeout(
        `https://amp-api.apps.apple.com/v1/catalog/${country}/apps/${appId}/reviews?${params}`,
        {
          Accept: 'application/json',
          Authorization: `Bearer ${token}`,
          Origin: 'https://apps.apple.com',
          Referer: landingUrl
        }
      );

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText} while reading reviews at offset ${offset}`);
      }

      const page = reviewsResponseSchema.parse(await response.json());
      reviews.push(...page.data.map(entry => entry.attributes));

      const nextOffset = page.next ? OFFSET_PATTERN.exec(page.next) : null;
      offset = nextOffset ? Number(nextOffset[1]) : null;
      this.log(`${appName}: ${reviews.length} reviews so far`);
    }

    return reviews;
  }
}
