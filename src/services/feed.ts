// File: src/services/feed.ts
// Region launch announcement feed
// Fetches the public RSS feed of region launches and extracts a launch date per region code.
// The feed only supplements Parameter Store data, so every failure here ends in an empty result.

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { z } from 'zod'
import { FeedEntry, Logger } from '../types'
import { APP_NAME, APP_VERSION } from '../config/constants'
import { describeError } from '../core/errors'
import { calendarDate, normalizeLaunchDate } from '../core/launch-dates'

export interface FeedOptions {
  timeoutSeconds: number
  allowHttpFallback: boolean
  logger: Logger
}

const REGION_CODE = /\b([a-z]{2}(?:-[a-z]+)+-\d+)\b/i

// "Fri, 25 Aug 2006 12:00:00 GMT"; the weekday is optional
const RFC822_DATE = /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\b/

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional()

const itemSchema = z.object({
  title: text,
  description: text,
  link: text,
  pubDate: text,
})

const feedSchema = z.object({
  rss: z.object({
    channel: z.object({
      item: z.array(z.unknown()).optional(),
    }),
  }),
})

/**
 * Find the first region code in free text, lower-cased
 */
export function extractRegionCode(value: string | undefined): string | undefined {
  const match = value ? REGION_CODE.exec(value) : null
  return match ? match[1].toLowerCase() : undefined
}

/**
 * Calendar date of an RSS pubDate as YYYY-MM-DD, or undefined when it cannot be read
 */
export function parsePubDate(value: string | undefined): string | undefined {
  if (!value) {
    return undefined
  }

  const match = RFC822_DATE.exec(value.trim())
  if (match) {
    const month = MONTHS.indexOf(match[2].toLowerCase())
    if (month < 0) {
      return undefined
    }
    return calendarDate(Number(match[3]), month, Number(match[1]))
  }

  // ISO timestamps and anything else Date.parse reads
  return normalizeLaunchDate(value)
}

/**
 * Parse feed XML into launch entries keyed by region code
 *
 * Documents carrying a DOCTYPE or entity declaration are refused before parsing.
 * Items without a region code or a readable date are skipped; when a region appears
 * more than once the earliest announcement wins.
 *
 * @throws Error when the document is not well-formed XML or not an RSS feed
 */
export function parseFeed(xml: string): Record<string, FeedEntry> {
  if (/<!DOCTYPE|<!ENTITY/i.test(xml)) {
    throw new Error('Feed contains a DOCTYPE or entity declaration')
  }

  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new Error(`Feed is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`)
  }

  const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    processEntities: true,
    htmlEntities: false,
    isArray: (name) => name === 'item',
  })
  const document: unknown = parser.parse(xml)

  const feed = feedSchema.safeParse(document)
  if (!feed.success) {
    throw new Error('Document is not an RSS feed')
  }

  const entries: Record<string, FeedEntry> = {}
  for (const rawItem of feed.data.rss.channel.item ?? []) {
    const item = itemSchema.safeParse(rawItem)
    if (!item.success) {
      continue
    }

    const { title, description, link, pubDate } = item.data
    if (title === undefined || description === undefined || pubDate === undefined) {
      continue
    }

    const regionCode = extractRegionCode(description) ?? extractRegionCode(title)
    const launchDate = parsePubDate(pubDate)
    if (!regionCode || !launchDate) {
      continue
    }

    const existing = entries[regionCode]
    if (existing && existing.launchDate <= launchDate) {
      continue
    }

    entries[regionCode] = {
      launchDate,
      formattedDate: pubDate,
      title,
      url: link ?? '',
    }
  }

  return entries
}

/**
 * Download the feed body
 *
 * Only https URLs are fetched, plus http ones when `allowHttpFallback` is set.
 *
 * @returns The response text, or undefined when the request failed
 */
export async function fetchFeed(url: string, options: FeedOptions): Promise<string | undefined> {
  const { logger } = options

  let scheme: string
  try {
    scheme = new URL(url).protocol
  } catch {
    logger.warn(`Ignoring announcement feed: invalid URL ${url}`)
    return undefined
  }

  if (scheme !== 'https:' && !(scheme === 'http:' && options.allowHttpFallback)) {
    logger.warn(`Ignoring announcement feed: ${scheme} URLs are not allowed (${url})`)
    return undefined
  }

  try {
    logger.debug(`Fetching announcement feed from ${url}`)
    const response = await fetch(url, {
      headers: { 'User-Agent': `${APP_NAME}/${APP_VERSION}` },
      signal: AbortSignal.timeout(options.timeoutSeconds * 1000),
    })
    if (!response.ok) {
      logger.warn(`Announcement feed request failed with HTTP ${response.status}`)
      return undefined
    }

    const body = await response.text()
    logger.debug(`Fetched announcement feed (${body.length} characters)`)
    return body
  } catch (error) {
    logger.warn(`Announcement feed request failed: ${describeError(error)}`)
    return undefined
  }
}

/**
 * Fetch and parse the feed. Never rejects: any failure yields an empty map.
 */
export async function loadFeedLaunchDates(url: string, options: FeedOptions): Promise<Record<string, FeedEntry>> {
  const body = await fetchFeed(url, options)
  if (body === undefined) {
    return {}
  }

  try {
    const entries = parseFeed(body)
    options.logger.debug(`Parsed launch dates for ${Object.keys(entries).length} regions from the announcement feed`)
    return entries
  } catch (error) {
    options.logger.warn(`Could not parse announcement feed: ${describeError(error)}`)
    return {}
  }
}
