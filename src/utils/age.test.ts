import { describe, it, expect } from 'vitest'
import { calculateAge } from './age'
import { parseCalendarDate, type CalendarDate } from './date'

const day = (text: string): CalendarDate => {
  const date = parseCalendarDate(text)
  if (!date) {
    throw new Error(`bad test date ${text}`)
  }
  return date
}

describe('calculateAge', () => {
  it('should count the birthday itself as reached', () => {
    expect(calculateAge(day('1990-05-10'), day('2024-05-10'))).toBe(34)
  })

  it('should not count a birthday that is still ahead', () => {
    expect(calculateAge(day('1990-05-10'), day('2024-05-09'))).toBe(33)
    expect(calculateAge(day('1991-12-25'), day('2024-06-01'))).toBe(32)
  })

  it('should return 0 on the day of birth', () => {
    expect(calculateAge(day('2024-01-01'), day('2024-01-01'))).toBe(0)
  })

  it('should return 0 before the first birthday', () => {
    expect(calculateAge(day('2023-06-15'), day('2024-06-14'))).toBe(0)
    expect(calculateAge(day('2023-06-15'), day('2024-06-15'))).toBe(1)
  })

  it('should compare month before day', () => {
    expect(calculateAge(day('2000-03-31'), day('2020-04-01'))).toBe(20)
    expect(calculateAge(day('2000-04-01'), day('2020-03-31'))).toBe(19)
  })

  it('should treat a leap day birthday as reached on 1 March in common years', () => {
    expect(calculateAge(day('2000-02-29'), day('2023-02-28'))).toBe(22)
    expect(calculateAge(day('2000-02-29'), day('2023-03-01'))).toBe(23)
    expect(calculateAge(day('2000-02-29'), day('2024-02-29'))).toBe(24)
  })

  it('should increase exactly once a year, on the birthday', () => {
    const dob = day('1988-08-20')
    const reference = new Date(Date.UTC(2020, 0, 1))
    let previous = calculateAge(dob, { year: 2020, month: 1, day: 1 })

    // Walk two full years one day at a time
    for (let i = 1; i <= 731; i++) {
      const current = new Date(reference.getTime() + i * 86_400_000)
      const today: CalendarDate = {
        year: current.getUTCFullYear(),
        month: current.getUTCMonth() + 1,
        day: current.getUTCDate()
      }
      const age = calculateAge(dob, today)
      const isBirthday = today.month === dob.month && today.day === dob.day

      expect(age).toBe(isBirthday ? previous + 1 : previous)
      previous = age
    }
  })
})
