import { useState, useCallback, useRef } from 'react';
import { apiClient, toApiError, type ApiError } from '../services/apiClient';
import { triggerDownload } from '../utils/download';

export interface ReviewExportState {
  isLoading: boolean;
  error?: ApiError;
  lastFilename?: string;
}

export interface UseReviewExportReturn extends ReviewExportState {
  exportReviews: (url: string) => Promise<void>;
  retryExport: () => Promise<void>;
  clearError: () => void;
}

export const useReviewExport = (): UseReviewExportReturn => {
  const [state, setState] = useState<ReviewExportState>({ isLoading: false });
  const lastUrlRef = useRef<string | null>(null);

  const exportReviews = useCallback(async (url: string) => {
    lastUrlRef.current = url;
    setState({ isLoading: true });

    try {
      const { filename, blob } = await apiClient.exportReviews(url);
      triggerDownload(blob, filename);
      setState({ isLoading: false, lastFilename: filename });
    } catch (error) {
      setState({ isLoading: false, error: toApiError(error) });
    }
  }, []);

  const retryExport = useCallback(async () => {
    if (lastUrlRef.current) {
      await exportReviews(lastUrlRef.current);
    }
  }, [exportReviews]);

  const clearError = useCallback(() => {
    setState(prev => ({ ...prev, error: undefined }));
  }, []);

  return {
    ...state,
    exportReviews,
    retryExport,
    clearError
  };
};
