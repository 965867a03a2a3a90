import type {
  AppStoreRawReview,
  EnrichedAppStoreReview,
  PlayStoreRawReview,
  ReviewTable,
  TableCell
} from '@shared/types';
import { MalformedRecordError } from '../utils/errors.js';

export const APPSTORE_COLUMNS = ['Datetime', 'Username', 'Review', 'Rating', 'Reply', 'Reply Datetime'] as const;
export const PLAYSTORE_COLUMNS = [...APPSTORE_COLUMNS, 'Thumbs Up'] as const;

const DATETIME_COLUMNS: ReadonlySet<string> = new Set(['Datetime', 'Reply Datetime']);

// Developer response timestamps, e.g. 2023-03-05T10:15:00Z
const RESPONSE_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

type SourceField<TRecord> = Extract<keyof TRecord, string>;

export interface ColumnMapping<TSource extends string> {
  source: TSource;
  column: string;
  format?: 'datetime';
}

export type RawReviewBatch =
  | { platform: 'appstore'; reviews: AppStoreRawReview[] }
  | { platform: 'playstore'; reviews: PlayStoreRawReview[] };

/**
 * Checks a mapping table against the canonical column order before it is used.
 * Datetime columns must be flagged as such and nothing else may be.
 */
export function defineColumnMappings<TRecord extends object>(
  mappings: ColumnMapping<SourceField<TRecord>>[],
  expectedColumns: readonly string[]
): readonly ColumnMapping<SourceField<TRecord>>[] {
  if (mappings.length !== expectedColumns.length) {
    throw new Error(`Column mapping defines ${mappings.length} columns, expected ${expectedColumns.length}`);
  }

  const seenSources = new Set<string>();
  mappings.forEach((mapping, index) => {
    if (mapping.column !== expectedColumns[index]) {
      throw new Error(`Column mapping #${index} targets '${mapping.column}', expected '${expectedColumns[index]}'`);
    }
    if (seenSources.has(mapping.source)) {
      throw new Error(`Source field '${mapping.source}' is mapped twice`);
    }
    seenSources.add(mapping.source);

    const isDatetimeColumn = DATETIME_COLUMNS.has(mapping.column);
    if (isDatetimeColumn !== (mapping.format === 'datetime')) {
      throw new Error(`Column '${mapping.column}' has the wrong datetime format flag`);
    }
  });

  return Object.freeze([...mappings]);
}

export const APPSTORE_MAPPINGS = defineColumnMappings<EnrichedAppStoreReview>([
  { source: 'date', column: 'Datetime', format: 'datetime' },
  { source: 'userName', column: 'Username' },
  { source: 'review', column: 'Review' },
  { source: 'rating', column: 'Rating' },
  { source: 'replyContent', column: 'Reply' },
  { source: 'repliedAt', column: 'Reply Datetime', format: 'datetime' }
], APPSTORE_COLUMNS);

export const PLAYSTORE_MAPPINGS = defineColumnMappings<PlayStoreRawReview>([
  { source: 'at', column: 'Datetime', format: 'datetime' },
  { source: 'userName', column: 'Username' },
  { source: 'content', column: 'Review' },
  { source: 'score', column: 'Rating' },
  { source: 'replyContent', column: 'Reply' },
  { source: 'repliedAt', column: 'Reply Datetime', format: 'datetime' },
  { source: 'thumbsUpCount', column: 'Thumbs Up' }
], PLAYSTORE_COLUMNS);

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/** DD/MM/YYYY from the UTC calendar date */
export function formatDate(date: Date): string {
  return `${pad(date.getUTCDate(), 2)}/${pad(date.getUTCMonth() + 1, 2)}/${pad(date.getUTCFullYear(), 4)}`;
}

export function stripNewlines(text: string): string {
  return text.replace(/\n/g, '');
}

export function parseResponseTimestamp(value: string, recordIndex: number): Date {
  const match = RESPONSE_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new MalformedRecordError('developerResponse.modified', recordIndex, `is not a YYYY-MM-DDTHH:MM:SSZ timestamp: ${value}`);
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));

  // Date.UTC rolls 2023-02-30 over into March instead of rejecting it
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day || hours > 23 || minutes > 59 || seconds > 59) {
    throw new MalformedRecordError('developerResponse.modified', recordIndex, `is not a valid date: ${value}`);
  }
  return date;
}

/**
 * Title and body are joined without a separator; the developer response is
 * flattened into reply fields that are always present.
 */
export function prepareAppStoreReview(raw: AppStoreRawReview, recordIndex: number): EnrichedAppStoreReview {
  const { developerResponse } = raw;

  return {
    date: raw.date,
    userName: raw.userName,
    review: raw.title + raw.review,
    rating: raw.rating,
    replyContent: developerResponse ? developerResponse.body : '',
    repliedAt: developerResponse ? parseResponseTimestamp(developerResponse.modified, recordIndex) : null
  };
}

function toCell(value: unknown, isDatetime: boolean, field: string, recordIndex: number): TableCell {
  if (value === undefined) {
    throw new MalformedRecordError(field, recordIndex);
  }

  if (isDatetime) {
    return value instanceof Date && !Number.isNaN(value.getTime()) ? formatDate(value) : '';
  }

  if (typeof value === 'string') {
    return stripNewlines(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return value;
  }
  throw new MalformedRecordError(field, recordIndex, `has an unsupported value of type ${typeof value}`);
}

/**
 * Projects records onto the mapped columns. The header is the first row and
 * records keep their input order.
 */
export function projectReviews<TRecord extends object>(
  records: readonly TRecord[],
  mappings: readonly ColumnMapping<SourceField<TRecord>>[]
): ReviewTable {
  const header: TableCell[] = mappings.map(mapping => mapping.column);

  const rows = records.map((record, recordIndex) =>
    mappings.map(mapping => {
      const value: unknown = mapping.source in record ? record[mapping.source] : undefined;
      return toCell(value, mapping.format === 'datetime', mapping.source, recordIndex);
    })
  );

  return [header, ...rows];
}

export function formatAppStoreReviews(reviews: readonly AppStoreRawReview[]): ReviewTable {
  return projectReviews(reviews.map(prepareAppStoreReview), APPSTORE_MAPPINGS);
}

export function formatPlayStoreReviews(reviews: readonly PlayStoreRawReview[]): ReviewTable {
  return projectReviews(reviews, PLAYSTORE_MAPPINGS);
}

export function normalizeReviews(batch: RawReviewBatch): ReviewTable {
  switch (batch.platform) {
    case 'appstore':
      return formatAppStoreReviews(batch.reviews);
    case 'playstore':
      return formatPlayStoreReviews(batch.reviews);
    default: {
      const unreachable: never = batch;
      throw new Error(`Unsupported review batch: ${JSON.stringify(unreachable)}`);
    }
  }
}
