import posthog from 'posthog-js'
import { config } from '@/lib/config'

export type AnalyticsEvent =
  | 'currency_added'
  | 'currency_removed'
  | 'currency_changed'
  | 'currencies_reordered'
  | 'base_currency_changed'
  | 'rates_refreshed'

export function initPostHog() {
  if (!config.posthogKey) {
    console.warn('PostHog API key not found. Analytics disabled.')
    return
  }

  posthog.init(config.posthogKey, {
    api_host: config.posthogHost,
    person_profiles: 'identified_only',
    capture_pageview: true,
    capture_pageleave: true,
    autocapture: false,
  })
}

export function captureEvent(eventName: AnalyticsEvent, properties?: Record<string, unknown>) {
  if (!config.posthogKey) return
  posthog.capture(eventName, properties)
}

export { posthog }
