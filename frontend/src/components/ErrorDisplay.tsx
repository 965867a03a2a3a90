import React from 'react';
import type { ApiError, ApiErrorType } from '../services/apiClient';

interface ErrorDisplayProps {
  error: ApiError;
  onRetry?: () => void;
  onDismiss?: () => void;
  className?: string;
}

const getErrorIcon = (type: ApiErrorType) => {
  switch (type) {
    case 'network':
    case 'fetch':
      return (
        <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
          <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M12 9v2m0 4h.01m-6.938 4h13.856c1.54 0 2.502-1.667 1.732-2.5L13.732 4c-.77-.833-1.964-.833-2.732 0L4.082 16.5c-.77.833.192 2.5 1.732 2.5z" />
        </svg>
      );
    case 'timeout':
    case 'rate_limit':
      return (
        <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
          <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M12 8v4l3 3m6-3a9 9 0 11-18 0 9 9 0 0118 0z" />
        </svg>
      );
    default:
      return (
        <svg className="w-6 h-6" fill="currentColor" viewBox="0 0 20 20">
          <path fillRule="evenodd" d="M18 10a8 8 0 11-16 0 8 8 0 0116 0zm-7 4a1 1 0 11-2 0 1 1 0 012 0zm-1-9a1 1 0 00-1 1v4a1 1 0 102 0V6a1 1 0 00-1-1z" clipRule="evenodd" />
        </svg>
      );
  }
};

const getErrorColor = (type: ApiErrorType) => {
  switch (type) {
    case 'validation':
      return 'text-yellow-600 bg-yellow-50 border-yellow-200';
    case 'network':
    case 'timeout':
    case 'rate_limit':
      return 'text-orange-600 bg-orange-50 border-orange-200';
    default:
      return 'text-red-600 bg-red-50 border-red-200';
  }
};

export const getErrorTitle = (type: ApiErrorType): string => {
  switch (type) {
    case 'validation':
      return 'Unsupported URL';
    case 'fetch':
      return 'Store Unavailable';
    case 'malformed_record':
      return 'Unexpected Review Data';
    case 'rate_limit':
      return 'Too Many Exports';
    case 'network':
      return 'Network Error';
    case 'timeout':
      return 'Request Timeout';
    case 'api':
      return 'Export Failed';
  }
};

const getErrorSuggestion = (type: ApiErrorType) => {
  switch (type) {
    case 'validation':
      return 'Paste the address of an app page from apps.apple.com or play.google.com.';
    case 'fetch':
      return 'The store did not answer as expected. This is usually temporary, please try again in a moment.';
    case 'rate_limit':
      return 'Wait a few minutes before starting another export.';
    case 'network':
      return 'Please check your internet connection and try again.';
    case 'timeout':
      return 'The export took too long to complete. Apps with many reviews can take several minutes.';
    default:
      return 'An unexpected error occurred. Please try again.';
  }
};

export const ErrorDisplay: React.FC<ErrorDisplayProps> = ({
  error,
  onRetry,
  onDismiss,
  className = ''
}) => {
  const colorClasses = getErrorColor(error.type);

  return (
    <div role="alert" className={`border rounded-lg p-6 ${colorClasses} ${className}`}>
      <div className="flex items-start">
        <div className="flex-shrink-0">
          {getErrorIcon(error.type)}
        </div>
        <div className="ml-3 flex-1">
          <div className="flex items-center justify-between">
            <h3 className="text-lg font-medium">{getErrorTitle(error.type)}</h3>
            {onDismiss && (
              <button
                onClick={onDismiss}
                className="ml-2 flex-shrink-0 rounded-md p-1.5 hover:bg-black hover:bg-opacity-10 focus:outline-none focus:ring-2 focus:ring-offset-2 focus:ring-current"
              >
                <span className="sr-only">Dismiss</span>
                <svg className="w-5 h-5" fill="currentColor" viewBox="0 0 20 20">
                  <path fillRule="evenodd" d="M4.293 4.293a1 1 0 011.414 0L10 8.586l4.293-4.293a1 1 0 111.414 1.414L11.414 10l4.293 4.293a1 1 0 01-1.414 1.414L10 11.414l-4.293 4.293a1 1 0 01-1.414-1.414L8.586 10 4.293 5.707a1 1 0 010-1.414z" clipRule="evenodd" />
                </svg>
              </button>
            )}
          </div>

          <p className="mt-1 text-sm font-medium">{error.message}</p>
          <p className="mt-3 text-sm">{getErrorSuggestion(error.type)}</p>

          {error.retryable && onRetry && (
            <div className="mt-4 flex space-x-3">
              <button
                onClick={onRetry}
                className="inline-flex items-center px-4 py-2 border border-transparent text-sm font-medium rounded-md shadow-sm text-white bg-current hover:bg-opacity-90 focus:outline-none focus:ring-2 focus:ring-offset-2 focus:ring-current"
              >
                Try Again
              </button>
            </div>
          )}
        </div>
      </div>
    </div>
  );
};
