import type { ExportedFile, StoreIds } from '@shared/types';
import { classifyAndExtract } from '../utils/urlClassifier.js';
import { tableToCsv } from '../utils/csv.js';
import { ReviewFetcher, DEFAULT_PLAYSTORE_LIMIT, UNBOUNDED } from './reviewFetcher.js';
import { normalizeReviews, type RawReviewBatch } from './reviewNormalizer.js';

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

export interface ExportOptions {
  country: string;
  lang: string;
  appStoreLimit: number;
  playStoreLimit: number;
}

const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  country: 'it',
  lang: 'it',
  appStoreLimit: UNBOUNDED,
  playStoreLimit: DEFAULT_PLAYSTORE_LIMIT
};

export function exportFilename(ids: StoreIds): string {
  switch (ids.platform) {
    case 'appstore':
      return `appstore_${ids.appName}_reviews.csv`;
    case 'playstore':
      return `playstore_${ids.appId.replace(/\./g, '_')}_reviews.csv`;
  }
}

/**
 * Turns a storefront URL into a downloadable CSV of its reviews:
 * classify, fetch, normalize, serialize. Nothing is kept between requests.
 */
export class ReviewExportService {
  private fetcher: ReviewFetcher;
  private options: ExportOptions;

  constructor(fetcher: ReviewFetcher, options: Partial<ExportOptions> = {}) {
    this.fetcher = fetcher;
    this.options = { ...DEFAULT_EXPORT_OPTIONS, ...options };
  }

  async handleExportRequest(url: string): Promise<ExportedFile> {
    const ids = classifyAndExtract(url);
    const batch = await this.fetchBatch(ids);

    return {
      filename: exportFilename(ids),
      contentType: CSV_CONTENT_TYPE,
      content: tableToCsv(normalizeReviews(batch))
    };
  }

  private async fetchBatch(ids: StoreIds): Promise<RawReviewBatch> {
    const { country, lang, appStoreLimit, playStoreLimit } = this.options;

    switch (ids.platform) {
      case 'appstore':
        return {
          platform: 'appstore',
          reviews: await this.fetcher.fetchAppStoreReviews(ids.appName, ids.appId, country, appStoreLimit)
        };
      case 'playstore':
        return {
          platform: 'playstore',
          reviews: await this.fetcher.fetchPlayStoreReviews(ids.appId, lang, country, playStoreLimit)
        };
    }
  }
}
