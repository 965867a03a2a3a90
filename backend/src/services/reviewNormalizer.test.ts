import { describe, it, expect } from 'vitest';
import type { AppStoreRawReview, PlayStoreRawReview } from '@shared/types';
import {
  APPSTORE_COLUMNS,
  PLAYSTORE_COLUMNS,
  PLAYSTORE_MAPPINGS,
  defineColumnMappings,
  formatAppStoreReviews,
  formatDate,
  formatPlayStoreReviews,
  normalizeReviews,
  parseResponseTimestamp,
  prepareAppStoreReview,
  projectReviews,
  stripNewlines
} from './reviewNormalizer.js';
import { MalformedRecordError } from '../utils/errors.js';
import { makeAppStoreReview, makePlayStoreReview } from '../test/reviewFixtures.js';

describe('formatDate', () => {
  it('formats as DD/MM/YYYY', () => {
    expect(formatDate(new Date(Date.UTC(2023, 2, 5)))).toBe('05/03/2023');
    expect(formatDate(new Date(Date.UTC(1999, 11, 31, 23, 59, 59)))).toBe('31/12/1999');
  });
});

describe('stripNewlines', () => {
  it('removes newlines and keeps everything else in order', () => {
    expect(stripNewlines('first\nsecond\n\nthird\n')).toBe('firstsecondthird');
    expect(stripNewlines('tab\tand\r\nreturn')).toBe('tab\tand\rreturn');
  });
});

describe('parseResponseTimestamp', () => {
  it('parses the developer response format as UTC', () => {
    expect(parseResponseTimestamp('2023-03-05T10:15:30Z', 0).toISOString()).toBe('2023-03-05T10:15:30.000Z');
  });

  it.each([
    '2023-03-05',
    '2023-03-05T10:15:30.000Z',
    '2023-03-05T10:15:30+01:00',
    '2023-02-30T10:15:30Z',
    '2023-03-05T25:15:30Z'
  ])('rejects %s', (value) => {
    expect(() => parseResponseTimestamp(value, 7)).toThrow(MalformedRecordError);
  });
});

describe('prepareAppStoreReview', () => {
  it('joins title and review without a separator', () => {
    const raw = makeAppStoreReview({ title: 'Great', review: ' app' });
    expect(prepareAppStoreReview(raw, 0).review).toBe('Great app');
  });

  it('fills empty reply fields when there is no developer response', () => {
    const prepared = prepareAppStoreReview(makeAppStoreReview(), 0);
    expect(prepared.replyContent).toBe('');
    expect(prepared.repliedAt).toBeNull();
  });

  it('flattens the developer response', () => {
    const raw = makeAppStoreReview({
      developerResponse: { id: 12, body: 'Thanks!', modified: '2023-04-01T08:00:00Z' }
    });
    const prepared = prepareAppStoreReview(raw, 0);

    expect(prepared.replyContent).toBe('Thanks!');
    expect(prepared.repliedAt).toEqual(new Date(Date.UTC(2023, 3, 1, 8, 0, 0)));
  });

  it('leaves the raw review untouched', () => {
    const raw = makeAppStoreReview();
    const snapshot = { ...raw };

    prepareAppStoreReview(raw, 0);

    expect(raw).toEqual(snapshot);
    expect(raw).not.toHaveProperty('replyContent');
  });
});

describe('formatAppStoreReviews', () => {
  it('puts the header first', () => {
    expect(formatAppStoreReviews([])).toEqual([[...APPSTORE_COLUMNS]]);
  });

  it('produces one row per review in the canonical column order', () => {
    const table = formatAppStoreReviews([makeAppStoreReview()]);

    expect(table).toEqual([
      ['Datetime', 'Username', 'Review', 'Rating', 'Reply', 'Reply Datetime'],
      ['05/03/2023', 'reviewer-one', 'Great app', 5, '', '']
    ]);
  });

  it('formats the developer response timestamp', () => {
    const table = formatAppStoreReviews([
      makeAppStoreReview({
        developerResponse: { id: 'r-1', body: 'We fixed it\nin 2.0', modified: '2023-04-01T08:00:00Z' }
      })
    ]);

    expect(table[1]).toEqual(['05/03/2023', 'reviewer-one', 'Great app', 5, 'We fixed itin 2.0', '01/04/2023']);
  });

  it('removes newlines from title, body and username', () => {
    const table = formatAppStoreReviews([
      makeAppStoreReview({ title: 'Multi\nline', review: '\nbody\n', userName: 'name\n' })
    ]);

    expect(table[1][1]).toBe('name');
    expect(table[1][2]).toBe('Multilinebody');
  });

  it('fails on a malformed response timestamp with the record index', () => {
    const reviews = [
      makeAppStoreReview(),
      makeAppStoreReview({ developerResponse: { id: 1, body: 'x', modified: 'yesterday' } })
    ];

    expect(() => formatAppStoreReviews(reviews)).toThrow(/^Review #1 field 'developerResponse.modified'/);
  });
});

describe('formatPlayStoreReviews', () => {
  it('adds the thumbs up column and copies numbers through', () => {
    const table = formatPlayStoreReviews([
      makePlayStoreReview({
        replyContent: 'Thanks\nfor the feedback',
        repliedAt: new Date(Date.UTC(2023, 2, 6, 1, 0, 0)),
        thumbsUpCount: 17
      })
    ]);

    expect(table).toEqual([
      [...PLAYSTORE_COLUMNS],
      ['05/03/2023', 'Player One', 'Works fine', 4, 'Thanksfor the feedback', '06/03/2023', 17]
    ]);
  });

  it('leaves reply cells empty without a reply', () => {
    const [, row] = formatPlayStoreReviews([makePlayStoreReview()]);
    expect(row[4]).toBeNull();
    expect(row[5]).toBe('');
  });

  it('keeps input order', () => {
    const table = formatPlayStoreReviews([
      makePlayStoreReview({ userName: 'newest' }),
      makePlayStoreReview({ userName: 'older' }),
      makePlayStoreReview({ userName: 'oldest' })
    ]);

    expect(table.slice(1).map(row => row[1])).toEqual(['newest', 'older', 'oldest']);
  });

  it('is deterministic for identical input', () => {
    const batch = [makePlayStoreReview(), makePlayStoreReview({ content: 'a\nb', score: 1 })];
    expect(JSON.stringify(formatPlayStoreReviews(batch))).toBe(JSON.stringify(formatPlayStoreReviews(batch)));
  });

  it('fails loudly when a record is missing a mapped field', () => {
    const incomplete: Partial<PlayStoreRawReview> = makePlayStoreReview();
    delete incomplete.thumbsUpCount;
    const project = () => projectReviews<Partial<PlayStoreRawReview>>([makePlayStoreReview(), incomplete], PLAYSTORE_MAPPINGS);

    expect(project).toThrow(MalformedRecordError);
    expect(project).toThrow("Review #1 field 'thumbsUpCount' is missing");
  });
});

describe('normalizeReviews', () => {
  it('dispatches on the platform tag', () => {
    const appStore: AppStoreRawReview[] = [makeAppStoreReview()];
    const playStore: PlayStoreRawReview[] = [makePlayStoreReview()];

    expect(normalizeReviews({ platform: 'appstore', reviews: appStore })[0]).toHaveLength(6);
    expect(normalizeReviews({ platform: 'playstore', reviews: playStore })[0]).toHaveLength(7);
  });
});

describe('defineColumnMappings', () => {
  type Row = { when: Date; who: string };

  it('accepts mappings matching the expected columns', () => {
    const mappings = defineColumnMappings<Row>(
      [
        { source: 'when', column: 'Datetime', format: 'datetime' },
        { source: 'who', column: 'Username' }
      ],
      ['Datetime', 'Username']
    );

    expect(projectReviews([{ when: new Date(Date.UTC(2023, 2, 5)), who: 'x' }], mappings)).toEqual([
      ['Datetime', 'Username'],
      ['05/03/2023', 'x']
    ]);
  });

  it('rejects a length mismatch', () => {
    expect(() => defineColumnMappings<Row>([{ source: 'who', column: 'Username' }], ['Username', 'Review'])).toThrow(
      'Column mapping defines 1 columns, expected 2'
    );
  });

  it('rejects columns out of order', () => {
    expect(() =>
      defineColumnMappings<Row>(
        [
          { source: 'who', column: 'Username' },
          { source: 'when', column: 'Datetime', format: 'datetime' }
        ],
        ['Datetime', 'Username']
      )
    ).toThrow("Column mapping #0 targets 'Username', expected 'Datetime'");
  });

  it('rejects a datetime column without the datetime format', () => {
    expect(() => defineColumnMappings<Row>([{ source: 'when', column: 'Datetime' }], ['Datetime'])).toThrow(
      "Column 'Datetime' has the wrong datetime format flag"
    );
  });

  it('rejects a source mapped twice', () => {
    expect(() =>
      defineColumnMappings<Row>(
        [
          { source: 'who', column: 'Username' },
          { source: 'who', column: 'Review' }
        ],
        ['Username', 'Review']
      )
    ).toThrow("Source field 'who' is mapped twice");
  });
});
