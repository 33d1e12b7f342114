// Test data factories

import type { User, UserInput } from '../../src/types'

export const createUserInput = (overrides: Partial<UserInput> = {}): UserInput => ({
  name: 'Alice',
  dob: '1990-05-10',
  ...overrides
})

export const createUser = (overrides: Partial<User> = {}): User => ({
  id: 1,
  name: 'Alice',
  dob: '1990-05-10',
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  updatedAt: new Date('2024-01-01T00:00:00.000Z'),
  ...overrides
})
