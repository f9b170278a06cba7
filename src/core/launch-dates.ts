// File: src/core/launch-dates.ts
// Launch date precedence: announcement feed first, then Parameter Store, else unknown

import { FeedEntry, LaunchDateSource } from '../types'

export interface LaunchDateResolution {
  launchDate?: string
  source: LaunchDateSource
  announcementUrl?: string
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/

/**
 * YYYY-MM-DD for a calendar date, or undefined when the day does not exist in that month
 *
 * @param month - Zero-based, as for `Date.UTC`
 */
export function calendarDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month, day))
  // Date.UTC rolls 31 Feb over into March; reading the parts back catches it
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return undefined
  }
  return date.toISOString().slice(0, 10)
}

/**
 * Reduce a date string to YYYY-MM-DD, or undefined when it is empty, "Unknown" or unparseable
 */
export function normalizeLaunchDate(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  if (!trimmed || trimmed.toLowerCase() === 'unknown') {
    return undefined
  }

  const iso = ISO_DATE.exec(trimmed)
  if (iso) {
    return calendarDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]))
  }

  const parsed = Date.parse(trimmed)
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString().slice(0, 10)
}

/**
 * Merge the two launch date sources for one region
 */
export function mergeLaunchDates(
  ssmLaunchDate: string | undefined,
  feedEntry: FeedEntry | undefined,
): LaunchDateResolution {
  const feedDate = normalizeLaunchDate(feedEntry?.launchDate)
  if (feedEntry && feedDate) {
    return {
      launchDate: feedDate,
      source: 'RSS',
      announcementUrl: feedEntry.url || undefined,
    }
  }

  const ssmDate = normalizeLaunchDate(ssmLaunchDate)
  if (ssmDate) {
    return { launchDate: ssmDate, source: 'SSM' }
  }

  return { source: 'Unknown' }
}

/**
 * Resolve launch dates for every region named by either source map.
 * The result depends only on the map contents, not on their iteration order.
 */
export function resolveLaunchDates(
  ssmDates: Record<string, string | undefined>,
  feed: Record<string, FeedEntry>,
): Record<string, LaunchDateResolution> {
  const codes = new Set([...Object.keys(ssmDates), ...Object.keys(feed)])

  return Object.fromEntries(
    [...codes]
      .sort()
      .map((code) => [
        code,
        mergeLaunchDates(
          Object.hasOwn(ssmDates, code) ? ssmDates[code] : undefined,
          Object.hasOwn(feed, code) ? feed[code] : undefined,
        ),
      ]),
  )
}
