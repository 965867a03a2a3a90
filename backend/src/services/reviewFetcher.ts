import type {
  AppStoreRawReview,
  AppStoreReviewService,
  ContinuationToken,
  PlayStorePage,
  PlayStoreRawReview,
  PlayStoreReviewService
} from '@shared/types';
import { FetchError } from '../utils/errors.js';

export const UNBOUNDED = Number.POSITIVE_INFINITY;
export const DEFAULT_PLAYSTORE_LIMIT = 100000;
// Largest page the Play Store serves reliably
export const PLAYSTORE_PAGE_SIZE = 150;

/**
 * Retrieves raw reviews from the two store services.
 *
 * Pages are requested strictly one after another: each Play Store page needs
 * the continuation token returned with the previous one. Service failures are
 * not retried; they surface as FetchError.
 */
export class ReviewFetcher {
  private appStore: AppStoreReviewService;
  private playStore: PlayStoreReviewService;
  private debugMode: boolean;

  constructor(appStore: AppStoreReviewService, playStore: PlayStoreReviewService, debugMode: boolean = false) {
    this.appStore = appStore;
    this.playStore = playStore;
    this.debugMode = debugMode;
  }

  private log(message: string): void {
    if (this.debugMode) {
      console.log(`[ReviewFetcher] ${message}`);
    }
  }

  /**
   * One bulk request for up to `limit` reviews. The result is cut to `limit`
   * since the service may return more than it was asked for.
   */
  async fetchAppStoreReviews(
    appName: string,
    appId: string,
    country: string = 'it',
    limit: number = UNBOUNDED
  ): Promise<AppStoreRawReview[]> {
    this.log(`Requesting up to ${limit} App Store reviews for ${appName} (${appId}, ${country})`);

    let reviews: AppStoreRawReview[];
    try {
      reviews = await this.appStore.fetchReviews({ country, appName, appId, howMany: limit });
    } catch (error) {
      throw new FetchError('appstore', error);
    }

    this.log(`Received ${reviews.length} App Store reviews`);
    return reviews.slice(0, limit);
  }

  /**
   * Accumulates pages of newest-first reviews until at least `limit` are
   * collected or a page comes back empty. The last page is kept whole, so the
   * result can exceed `limit` by up to one page.
   */
  async fetchPlayStoreReviews(
    appId: string,
    lang: string = 'it',
    country: string = 'it',
    limit: number = DEFAULT_PLAYSTORE_LIMIT
  ): Promise<PlayStoreRawReview[]> {
    const result: PlayStoreRawReview[] = [];
    let continuationToken: ContinuationToken | undefined;
    let pageNumber = 0;

    while (result.length < limit) {
      pageNumber++;

      let page: PlayStorePage;
      try {
        page = await this.playStore.fetchPage({
          appId,
          lang,
          country,
          sort: 'newest',
          filterScoreWith: null,
          count: PLAYSTORE_PAGE_SIZE,
          continuationToken
        });
      } catch (error) {
        throw new FetchError('playstore', error);
      }

      if (page.reviews.length === 0) {
        this.log(`Page ${pageNumber} was empty, no more reviews for ${appId}`);
        break;
      }

      result.push(...page.reviews);
      continuationToken = page.continuationToken;
      this.log(`Page ${pageNumber}: ${page.reviews.length} reviews (total ${result.length})`);
    }

    return result;
  }
}
