import { useCallback } from 'react'
import { UrlInput } from './components/UrlInput'
import { ErrorDisplay } from './components/ErrorDisplay'
import { useReviewExport } from './hooks/useReviewExport'

function App() {
  const {
    isLoading,
    error,
    lastFilename,
    exportReviews,
    retryExport,
    clearError
  } = useReviewExport()

  const handleExport = useCallback((url: string) => {
    void exportReviews(url)
  }, [exportReviews])

  const handleRetry = useCallback(() => {
    void retryExport()
  }, [retryExport])

  return (
    <div className="min-h-screen bg-gray-50">
      <main className="max-w-6xl mx-auto px-4 py-12 space-y-8">
        <div className="text-center">
          <h1 className="text-3xl font-bold tracking-wide text-gray-900 mb-4">
            REVIEW SCRAPER
          </h1>
          <p className="text-lg text-gray-600 max-w-3xl mx-auto">
            Download every review of an App Store or Play Store app as a CSV file.
          </p>
        </div>

        <UrlInput
          onSubmit={handleExport}
          isLoading={isLoading}
          disabled={isLoading}
        />

        {error && (
          <div className="w-full max-w-4xl mx-auto">
            <ErrorDisplay
              error={error}
              onRetry={error.retryable ? handleRetry : undefined}
              onDismiss={clearError}
            />
          </div>
        )}

        {!error && !isLoading && lastFilename && (
          <p className="text-center text-green-700">
            Downloaded {lastFilename}
          </p>
        )}
      </main>
    </div>
  )
}

export default App
