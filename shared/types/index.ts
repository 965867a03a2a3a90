// Core data models shared by the review export backend and frontend

export type StorePlatform = 'appstore' | 'playstore';

// Identifiers extracted from a storefront URL
export interface AppStoreIds {
  platform: 'appstore';
  appId: string;
  appName: string;
}

export interface PlayStoreIds {
  platform: 'playstore';
  appId: string;
}

export type StoreIds = AppStoreIds | PlayStoreIds;

export interface AppStoreDeveloperResponse {
  id: number | string;
  body: string;
  // ISO-8601, e.g. 2023-03-05T10:15:00Z
  modified: string;
}

export interface AppStoreRawReview {
  date: Date;
  developerResponse?: AppStoreDeveloperResponse;
  review: string;
  title: string;
  rating: number;
  isEdited: boolean;
  userName: string;
}

export interface PlayStoreRawReview {
  reviewId: string;
  userName: string;
  userImage: string | null;
  content: string;
  score: number;
  thumbsUpCount: number;
  reviewCreatedVersion: string | null;
  at: Date;
  replyContent: string | null;
  repliedAt: Date | null;
  appVersion: string | null;
}

// App Store review after title/body concatenation and reply flattening
export interface EnrichedAppStoreReview {
  date: Date;
  userName: string;
  review: string;
  rating: number;
  replyContent: string;
  repliedAt: Date | null;
}

export type TableCell = string | number | boolean | null;

// First row is the header
export type ReviewTable = TableCell[][];

// Service interfaces
export interface AppStoreReviewQuery {
  country: string;
  appName: string;
  appId: string;
  howMany: number;
}

export interface AppStoreReviewService {
  fetchReviews(query: AppStoreReviewQuery): Promise<AppStoreRawReview[]>;
}

// Opaque to callers: only the service that issued it reads the cursor
export interface ContinuationToken {
  readonly cursor: string | null;
}

export interface PlayStorePageQuery {
  appId: string;
  lang: string;
  country: string;
  sort: 'newest';
  filterScoreWith: null;
  count: number;
  continuationToken?: ContinuationToken;
}

export interface PlayStorePage {
  reviews: PlayStoreRawReview[];
  continuationToken?: ContinuationToken;
}

export interface PlayStoreReviewService {
  fetchPage(query: PlayStorePageQuery): Promise<PlayStorePage>;
}

// API types
export type ExportErrorType = 'validation' | 'fetch' | 'malformed_record' | 'rate_limit' | 'api';

export interface ExportRequest {
  url: string;
}

export interface ExportErrorResponse {
  error: string;
  errorType: ExportErrorType;
}

export interface ExportedFile {
  filename: string;
  contentType: string;
  content: string;
}
