// User-related type definitions

export type { User } from '../db/schema'

// Accepted by create and update; dob is YYYY-MM-DD text
export interface UserInput {
  name: string
  dob: string
}

export interface UserSummary {
  id: number
  name: string
  dob: string
  age?: number // set on reads only
}

export interface UserPage {
  users: UserSummary[]
  total: number
  page: number
  pageSize: number
  totalPages: number
}
