import type { ExportErrorType, ExportRequest } from '../../../shared/types';

export type ApiErrorType = ExportErrorType | 'network' | 'timeout';

export interface ApiError {
  message: string;
  type: ApiErrorType;
  retryable: boolean;
}

export interface ExportDownload {
  filename: string;
  blob: Blob;
}

export const FALLBACK_FILENAME = 'reviews.csv';

// Large Play Store exports walk thousands of pages
const EXPORT_TIMEOUT_MS = 10 * 60 * 1000;

const SERVER_ERROR_TYPES: readonly ExportErrorType[] = ['validation', 'fetch', 'malformed_record', 'rate_limit', 'api'];

const isServerErrorType = (value: unknown): value is ExportErrorType =>
  typeof value === 'string' && SERVER_ERROR_TYPES.some(type => type === value);

export const isApiError = (value: unknown): value is ApiError =>
  typeof value === 'object' &&
  value !== null &&
  'message' in value &&
  typeof value.message === 'string' &&
  'type' in value &&
  'retryable' in value &&
  typeof value.retryable === 'boolean';

export const filenameFromDisposition = (header: string | null): string => {
  const match = header ? /filename="?([^";]+)"?/.exec(header) : null;
  return match ? match[1] : FALLBACK_FILENAME;
};

export const toApiError = (error: unknown): ApiError => {
  if (isApiError(error)) {
    return error;
  }

  // fetch rejects with a TypeError when the server cannot be reached
  if (error instanceof TypeError) {
    return {
      message: 'Network error. Please check your internet connection and try again.',
      type: 'network',
      retryable: true
    };
  }

  if (error instanceof Error && error.message === 'Request timeout') {
    return {
      message: 'Request timed out. The export may be too large, please try again later.',
      type: 'timeout',
      retryable: true
    };
  }

  return {
    message: error instanceof Error ? error.message : 'An unexpected error occurred',
    type: 'api',
    retryable: true
  };
};

export class ReviewExportApiClient {
  private baseUrl: string;
  private timeout: number;

  constructor(baseUrl?: string, timeout = EXPORT_TIMEOUT_MS) {
    this.baseUrl = baseUrl || this.getDefaultBaseUrl();
    this.timeout = timeout;
  }

  private getDefaultBaseUrl(): string {
    // In development, use localhost:3001, in production use relative URLs
    if (import.meta.env.DEV) {
      return 'http://localhost:3001/api';
    }
    return '/api';
  }

  private async fetchWithTimeout(url: string, options: RequestInit = {}): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
        headers: {
          'Content-Type': 'application/json',
          ...options.headers
        }
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error('Request timeout');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readError(response: Response): Promise<ApiError> {
    const body: unknown = await response.json().catch(() => null);
    const hasBody = typeof body === 'object' && body !== null;
    const message = hasBody && 'error' in body && typeof body.error === 'string'
      ? body.error
      : `HTTP ${response.status}: ${response.statusText}`;
    const type = hasBody && 'errorType' in body && isServerErrorType(body.errorType) ? body.errorType : 'api';

    return { message, type, retryable: type !== 'validation' };
  }

  /**
   * Export every review of the app behind a store URL as a CSV file
   */
  async exportReviews(url: string): Promise<ExportDownload> {
    const request: ExportRequest = { url };

    try {
      const response = await this.fetchWithTimeout(`${this.baseUrl}/export`, {
        method: 'POST',
        body: JSON.stringify(request)
      });

      if (!response.ok) {
        throw await this.readError(response);
      }

      return {
        filename: filenameFromDisposition(response.headers.get('Content-Disposition')),
        blob: await response.blob()
      };
    } catch (error) {
      throw toApiError(error);
    }
  }
}

// Create a singleton instance
export const apiClient = new ReviewExportApiClient();
