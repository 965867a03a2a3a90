import type { ExportErrorType, StorePlatform } from '@shared/types';

export const UNSUPPORTED_URL_MESSAGE = 'Invalid url. Make sure to use a Playstore or Appstore url.';

const PLATFORM_LABELS: Record<StorePlatform, string> = {
  appstore: 'App Store',
  playstore: 'Play Store'
};

/**
 * Base class for every error the export pipeline raises on purpose.
 * `errorType` is what the API reports to the frontend.
 */
export abstract class ExportError extends Error {
  abstract readonly errorType: ExportErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedUrlError extends ExportError {
  readonly errorType = 'validation';

  constructor(readonly url: string) {
    super(UNSUPPORTED_URL_MESSAGE);
  }
}

export class FetchError extends ExportError {
  readonly errorType = 'fetch';

  constructor(readonly platform: StorePlatform, cause: unknown) {
    super(`Failed to fetch ${PLATFORM_LABELS[platform]} reviews: ${describeCause(cause)}`, { cause });
  }
}

// A raw review broke the field contract between the fetch services and the normalizer
export class MalformedRecordError extends ExportError {
  readonly errorType = 'malformed_record';

  constructor(readonly field: string, readonly recordIndex: number, detail = 'is missing') {
    super(`Review #${recordIndex} field '${field}' ${detail}`);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : 'Unknown error';
}
