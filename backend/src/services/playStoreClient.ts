import gplay from 'google-play-scraper';
import { z } from 'zod';
import type {
  ContinuationToken,
  PlayStorePage,
  PlayStorePageQuery,
  PlayStoreRawReview,
  PlayStoreReviewService
} from '@shared/types';

export type ScraperReviewsOptions = Parameters<typeof gplay.reviews>[0];

/** The part of google-play-scraper this client calls */
export interface ReviewsScraper {
  reviews(options: ScraperReviewsOptions): Promise<unknown>;
  sort: { NEWEST: number };
}

const scraperReviewSchema = z.object({
  id: z.string(),
  userName: z.string(),
  userImage: z.string().nullish(),
  date: z.coerce.date(),
  score: z.number().int().min(1).max(5),
  text: z.string().nullish(),
  replyDate: z.string().nullish(),
  replyText: z.string().nullish(),
  version: z.string().nullish(),
  thumbsUp: z.number().int().nonnegative()
});

const scraperPageSchema = z.object({
  data: z.array(scraperReviewSchema),
  nextPaginationToken: z.string().nullish()
});

type ScraperReview = z.infer<typeof scraperReviewSchema>;

export function toPlayStoreRawReview(item: ScraperReview): PlayStoreRawReview {
  return {
    reviewId: item.id,
    userName: item.userName,
    userImage: item.userImage ?? null,
    content: item.text ?? '',
    score: item.score,
    thumbsUpCount: item.thumbsUp,
    // The library reports one version per review, used for both version fields
    reviewCreatedVersion: item.version ?? null,
    at: item.date,
    replyContent: item.replyText ?? null,
    repliedAt: item.replyDate ? new Date(item.replyDate) : null,
    appVersion: item.version ?? null
  };
}

export interface PlayStoreClientOptions {
  debugMode?: boolean;
  scraper?: ReviewsScraper;
}

/**
 * Page-at-a-time access to Play Store reviews through google-play-scraper.
 *
 * A token whose cursor is null marks an exhausted listing: asking for the
 * page after it returns no reviews instead of restarting from the newest.
 */
export class GooglePlayScraperClient implements PlayStoreReviewService {
  private debugMode: boolean;
  private scraper: ReviewsScraper;

  constructor(options: PlayStoreClientOptions = {}) {
    this.debugMode = options.debugMode ?? false;
    this.scraper = options.scraper ?? gplay;
  }

  private log(message: string): void {
    if (this.debugMode) {
      console.log(`[GooglePlayScraperClient] ${message}`);
    }
  }

  async fetchPage(query: PlayStorePageQuery): Promise<PlayStorePage> {
    if (query.continuationToken && query.continuationToken.cursor === null) {
      return { reviews: [], continuationToken: query.continuationToken };
    }

    const { scraper } = this;
    const response = await scraper.reviews({
      appId: query.appId,
      lang: query.lang,
      country: query.country,
      sort: scraper.sort.NEWEST,
      num: query.count,
      paginate: true,
      nextPaginationToken: query.continuationToken?.cursor ?? undefined
    });
    const page = scraperPageSchema.parse(response);

    const continuationToken: ContinuationToken = { cursor: page.nextPaginationToken ?? null };
    this.log(`${query.appId}: ${page.data.length} reviews, ${continuationToken.cursor ? 'more available' : 'last page'}`);

    return {
      reviews: page.data.map(toPlayStoreRawReview),
      continuationToken
    };
  }
}
