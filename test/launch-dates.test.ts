import { describe, expect, it } from 'vitest'
import { calendarDate, mergeLaunchDates, normalizeLaunchDate, resolveLaunchDates } from '../src/core/launch-dates'
import { FeedEntry } from '../src/types'

const feedEntry = (launchDate: string, url = 'https://example.com/launch'): FeedEntry => ({
  launchDate,
  formattedDate: 'Fri, 25 Aug 2006 12:00:00 GMT',
  title: 'Region launch',
  url,
})

describe('normalizeLaunchDate', () => {
  it('keeps the calendar date of ISO values', () => {
    expect(normalizeLaunchDate('2006-08-25')).toBe('2006-08-25')
    expect(normalizeLaunchDate('2006-08-25T23:00:00Z')).toBe('2006-08-25')
  })

  it('drops empty, unknown and unreadable values', () => {
    expect(normalizeLaunchDate(undefined)).toBeUndefined()
    expect(normalizeLaunchDate('  ')).toBeUndefined()
    expect(normalizeLaunchDate('Unknown')).toBeUndefined()
    expect(normalizeLaunchDate('not a date')).toBeUndefined()
    expect(normalizeLaunchDate('2006-13-45')).toBeUndefined()
  })

  it('drops days that do not exist in their month', () => {
    expect(normalizeLaunchDate('2023-02-31')).toBeUndefined()
    expect(normalizeLaunchDate('2023-04-31T00:00:00Z')).toBeUndefined()
    expect(normalizeLaunchDate('2023-02-29')).toBeUndefined()
    expect(normalizeLaunchDate('2024-02-29')).toBe('2024-02-29')
  })
})

describe('calendarDate', () => {
  it('formats real dates with a zero-based month', () => {
    expect(calendarDate(2016, 11, 31)).toBe('2016-12-31')
    expect(calendarDate(2020, 1, 29)).toBe('2020-02-29')
  })

  it('refuses dates that would roll over into the next month', () => {
    expect(calendarDate(2021, 1, 29)).toBeUndefined()
    expect(calendarDate(2021, 5, 31)).toBeUndefined()
    expect(calendarDate(2021, 0, 0)).toBeUndefined()
  })
})

describe('mergeLaunchDates', () => {
  it('prefers a readable feed date and keeps its announcement link', () => {
    expect(mergeLaunchDates('2010-01-01', feedEntry('2006-08-25'))).toEqual({
      launchDate: '2006-08-25',
      source: 'RSS',
      announcementUrl: 'https://example.com/launch',
    })
  })

  it('falls back to the Parameter Store date', () => {
    expect(mergeLaunchDates('2010-01-01', undefined)).toEqual({ launchDate: '2010-01-01', source: 'SSM' })
    expect(mergeLaunchDates('2010-01-01', feedEntry('Unknown'))).toEqual({ launchDate: '2010-01-01', source: 'SSM' })
  })

  it('reports an unknown date when neither source has one', () => {
    expect(mergeLaunchDates('Unknown', undefined)).toEqual({ source: 'Unknown' })
    expect(mergeLaunchDates(undefined, feedEntry(''))).toEqual({ source: 'Unknown' })
  })

  it('omits an empty announcement link', () => {
    const merged = mergeLaunchDates(undefined, feedEntry('2006-08-25', ''))
    expect(merged.source).toBe('RSS')
    expect(merged.announcementUrl).toBeUndefined()
  })
})

describe('resolveLaunchDates', () => {
  it('does not depend on map insertion order', () => {
    const ssm = { 'us-east-1': '2006-08-25', 'eu-west-1': 'Unknown' }
    const feed = { 'eu-west-1': feedEntry('2007-12-10'), 'ap-south-1': feedEntry('2016-06-27') }

    const forward = resolveLaunchDates(ssm, feed)
    const backward = resolveLaunchDates(
      { 'eu-west-1': 'Unknown', 'us-east-1': '2006-08-25' },
      { 'ap-south-1': feedEntry('2016-06-27'), 'eu-west-1': feedEntry('2007-12-10') },
    )

    expect(JSON.stringify(backward)).toBe(JSON.stringify(forward))
    expect(forward['eu-west-1'].source).toBe('RSS')
    expect(forward['us-east-1'].source).toBe('SSM')
    expect(forward['ap-south-1'].launchDate).toBe('2016-06-27')
  })
})
