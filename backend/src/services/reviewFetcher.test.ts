import { describe, it, expect } from 'vitest';
import { ReviewFetcher, PLAYSTORE_PAGE_SIZE } from './reviewFetcher.js';
import { FetchError } from '../utils/errors.js';
import { FakeAppStoreService, FakePlayStoreService, makeAppStoreReview } from '../test/reviewFixtures.js';

describe('ReviewFetcher.fetchPlayStoreReviews', () => {
  it('stops after the first empty page', async () => {
    const playStore = new FakePlayStoreService([150, 150, 40, 0]);
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), playStore);

    const reviews = await fetcher.fetchPlayStoreReviews('com.example.app', 'it', 'it', 1000);

    expect(reviews).toHaveLength(340);
    expect(playStore.calls).toHaveLength(4);
  });

  it('keeps the whole last page when it overshoots the limit', async () => {
    const playStore = new FakePlayStoreService([-150]);
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), playStore);

    const reviews = await fetcher.fetchPlayStoreReviews('com.example.app', 'it', 'it', 200);

    expect(reviews).toHaveLength(300);
    expect(playStore.calls).toHaveLength(2);
  });

  it('threads the continuation token from one page to the next', async () => {
    const playStore = new FakePlayStoreService([150, 150, 0]);
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), playStore);

    await fetcher.fetchPlayStoreReviews('com.example.app');

    expect(playStore.calls.map(call => call.continuationToken)).toEqual([
      undefined,
      { cursor: 'page-1' },
      { cursor: 'page-2' }
    ]);
  });

  it('asks for newest-first unfiltered pages with the given locale', async () => {
    const playStore = new FakePlayStoreService([0]);
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), playStore);

    await fetcher.fetchPlayStoreReviews('com.example.app', 'en', 'us');

    expect(playStore.calls[0]).toEqual({
      appId: 'com.example.app',
      lang: 'en',
      country: 'us',
      sort: 'newest',
      filterScoreWith: null,
      count: PLAYSTORE_PAGE_SIZE,
      continuationToken: undefined
    });
  });

  it('preserves the order pages arrive in', async () => {
    const playStore = new FakePlayStoreService([2, 1, 0]);
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), playStore);

    const reviews = await fetcher.fetchPlayStoreReviews('com.example.app');

    expect(reviews.map(review => review.reviewId)).toEqual(['review-1', 'review-2', 'review-3']);
  });

  it('wraps service failures in a FetchError', async () => {
    const cause = new Error('socket hang up');
    const fetcher = new ReviewFetcher(new FakeAppStoreService(), new FakePlayStoreService([], cause));

    const failure = fetcher.fetchPlayStoreReviews('com.example.app');

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      platform: 'playstore',
      cause,
      message: 'Failed to fetch Play Store reviews: socket hang up'
    });
  });
});

describe('ReviewFetcher.fetchAppStoreReviews', () => {
  it('passes the query through with defaults', async () => {
    const appStore = new FakeAppStoreService([makeAppStoreReview()]);
    const fetcher = new ReviewFetcher(appStore, new FakePlayStoreService([]));

    const reviews = await fetcher.fetchAppStoreReviews('enel-x-way', '1377291789');

    expect(reviews).toHaveLength(1);
    expect(appStore.calls).toEqual([
      { country: 'it', appName: 'enel-x-way', appId: '1377291789', howMany: Number.POSITIVE_INFINITY }
    ]);
  });

  it('truncates to the limit when the service returns more', async () => {
    const served = Array.from({ length: 5 }, (_, i) => makeAppStoreReview({ userName: `user-${i}` }));
    const fetcher = new ReviewFetcher(new FakeAppStoreService(served), new FakePlayStoreService([]));

    const reviews = await fetcher.fetchAppStoreReviews('some-app', '42', 'us', 3);

    expect(reviews.map(review => review.userName)).toEqual(['user-0', 'user-1', 'user-2']);
  });

  it('wraps service failures in a FetchError', async () => {
    const fetcher = new ReviewFetcher(
      new FakeAppStoreService([], new Error('HTTP 503: Service Unavailable')),
      new FakePlayStoreService([])
    );

    await expect(fetcher.fetchAppStoreReviews('some-app', '42')).rejects.toMatchObject({
      name: 'FetchError',
      platform: 'appstore',
      message: 'Failed to fetch App Store reviews: HTTP 503: Service Unavailable'
    });
  });
});
