import React, { useState } from 'react'

interface UrlInputProps {
  onSubmit: (url: string) => void
  isLoading?: boolean
  disabled?: boolean
}

export const UrlInput: React.FC<UrlInputProps> = ({
  onSubmit,
  isLoading = false,
  disabled = false
}) => {
  const [url, setUrl] = useState('')

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault()

    // An empty field is not an error, there is simply nothing to export
    const trimmed = url.trim()
    if (!trimmed) {
      return
    }

    onSubmit(trimmed)
  }

  return (
    <div className="w-full max-w-4xl mx-auto">
      <form onSubmit={handleSubmit} className="space-y-4">
        <div>
          <label htmlFor="url-input" className="block text-sm font-medium text-gray-700 mb-2">
            App Store or Play Store URL
          </label>
          <div className="relative">
            <input
              id="url-input"
              type="text"
              value={url}
              onChange={e => setUrl(e.target.value)}
              disabled={disabled || isLoading}
              placeholder="Enter app url..."
              className="
                w-full px-4 py-3 text-lg border border-gray-300 rounded-lg shadow-sm
                focus:ring-2 focus:ring-blue-500 focus:border-blue-500
                disabled:bg-gray-100 disabled:cursor-not-allowed
              "
            />
            {isLoading && (
              <div className="absolute right-3 top-1/2 transform -translate-y-1/2">
                <div className="animate-spin rounded-full h-5 w-5 border-b-2 border-blue-600"></div>
              </div>
            )}
          </div>
        </div>

        <button
          type="submit"
          disabled={disabled || isLoading}
          className={`
            w-full py-3 px-6 text-lg font-medium rounded-lg shadow-sm
            focus:outline-none focus:ring-2 focus:ring-offset-2
            disabled:opacity-50 disabled:cursor-not-allowed
            ${isLoading
              ? 'bg-gray-300 text-gray-500'
              : 'bg-blue-600 hover:bg-blue-700 text-white focus:ring-blue-500'
            }
          `}
        >
          {isLoading ? (
            <span className="flex items-center justify-center">
              <div className="animate-spin rounded-full h-5 w-5 border-b-2 border-white mr-2"></div>
              Exporting Reviews...
            </span>
          ) : (
            'Export Reviews'
          )}
        </button>
      </form>

      <div className="mt-6 p-4 bg-blue-50 rounded-lg">
        <h3 className="text-sm font-medium text-blue-900 mb-2">Example URLs:</h3>
        <ul className="text-sm text-blue-700 space-y-1">
          <li>• App Store: https://apps.apple.com/it/app/some-app/id1234567890</li>
          <li>• Play Store: https://play.google.com/store/apps/details?id=com.example.app</li>
        </ul>
      </div>
    </div>
  )
}
