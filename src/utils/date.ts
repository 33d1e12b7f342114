/**
 * Date-only values. Dates of birth never carry a time of day, so they are kept
 * as plain year/month/day triples instead of Date instances.
 */

export interface CalendarDate {
  year: number
  month: number // 1-12
  day: number // 1-31
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28
    case 4:
    case 6:
    case 9:
    case 11:
      return 30
    default:
      return 31
  }
}

/**
 * Parse a strict YYYY-MM-DD string.
 *
 * @returns The calendar date, or null when the text is not in that form or names a day that does not exist
 */
export function parseCalendarDate(text: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(text)
  if (!match) {
    return null
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  // Postgres has no year zero
  if (year < 1 || month < 1 || month > 12) {
    return null
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null
  }

  return { year, month, day }
}

export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0')
  const month = String(date.month).padStart(2, '0')
  const day = String(date.day).padStart(2, '0')
  return `${year}-${month}-${day}`
}

// Server-local calendar day of an instant
export function toCalendarDate(instant: Date): CalendarDate {
  return {
    year: instant.getFullYear(),
    month: instant.getMonth() + 1,
    day: instant.getDate()
  }
}
