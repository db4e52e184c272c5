import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { QueryClientProvider } from '@tanstack/react-query'
import { I18nProvider } from 'react-aria'
import { PostHogProvider } from 'posthog-js/react'
import { queryClient } from './lib/queryClient'
import { ExchangeStoreProvider } from './contexts/ExchangeStoreContext'
import { initPostHog, posthog } from './lib/posthog'
import App from './App'
import './styles/globals.css'

// Initialize PostHog
initPostHog()

const rootElement = document.getElementById('root')
if (!rootElement) {
  throw new Error('Root element #root not found')
}

createRoot(rootElement).render(
  <StrictMode>
    <PostHogProvider client={posthog}>
      <QueryClientProvider client={queryClient}>
        <I18nProvider locale="en-US">
          <ExchangeStoreProvider>
            <App />
          </ExchangeStoreProvider>
        </I18nProvider>
      </QueryClientProvider>
    </PostHogProvider>
  </StrictMode>,
)
