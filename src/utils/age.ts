import type { CalendarDate } from './date'

/**
 * Whole years elapsed between a date of birth and a reference date.
 *
 * The birthday itself counts as reached, and a 29 February birthday is compared
 * like any other (month, day) pair, so in common years it is reached on 1 March.
 * A date of birth after the reference date is not meaningful here.
 */
export function calculateAge(dateOfBirth: CalendarDate, reference: CalendarDate): number {
  let age = reference.year - dateOfBirth.year

  const birthdayNotYetReached =
    reference.month < dateOfBirth.month ||
    (reference.month === dateOfBirth.month && reference.day < dateOfBirth.day)

  if (birthdayNotYetReached) {
    age--
  }

  return age
}
