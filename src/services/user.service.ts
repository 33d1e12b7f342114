import type { User } from '../db/schema'
import { InvalidDateError, NotFoundError } from '../middleware/error.middleware'
import type { UserRepository } from '../repositories/user.repository'
import type { UserInput, UserPage, UserSummary } from '../types/user'
import { calculateAge } from '../utils/age'
import { formatCalendarDate, parseCalendarDate, toCalendarDate, type CalendarDate } from '../utils/date'
import { normalizePageRequest, pageOffset, totalPages, type PageRequest } from '../utils/pagination'

export type Clock = () => Date

export interface UserService {
  createUser(input: UserInput, signal?: AbortSignal): Promise<UserSummary>
  getUser(id: number, signal?: AbortSignal): Promise<UserSummary>
  listUsers(request: PageRequest, signal?: AbortSignal): Promise<UserPage>
  updateUser(id: number, input: UserInput, signal?: AbortSignal): Promise<UserSummary>
  deleteUser(id: number, signal?: AbortSignal): Promise<void>
}

/**
 * DefaultUserService sits between the routes and the repository.
 * It parses dates of birth and attaches the computed age to read results;
 * create and update results carry no age.
 */
export class DefaultUserService implements UserService {
  private repository: UserRepository
  private clock: Clock

  /**
   * @param repository - Store for user rows
   * @param clock - Source of "now" for age computation
   */
  constructor(repository: UserRepository, clock: Clock = () => new Date()) {
    this.repository = repository
    this.clock = clock
  }

  async createUser(input: UserInput, signal?: AbortSignal): Promise<UserSummary> {
    const dob = formatCalendarDate(this.parseDateOfBirth(input.dob))

    const user = await this.repository.create(input.name, dob, signal)
    return this.toSummary(user)
  }

  async getUser(id: number, signal?: AbortSignal): Promise<UserSummary> {
    const user = await this.repository.getById(id, signal)
    if (!user) {
      throw new NotFoundError()
    }

    return this.toSummary(user, this.today())
  }

  /**
   * The page and the total come from two separate reads, so under concurrent
   * writes the total may not match the rows returned.
   */
  async listUsers(request: PageRequest, signal?: AbortSignal): Promise<UserPage> {
    const { page, pageSize } = normalizePageRequest(request)

    const rows = await this.repository.list(pageSize, pageOffset(page, pageSize), signal)
    const total = await this.repository.count(signal)
    const today = this.today()

    return {
      users: rows.map(user => this.toSummary(user, today)),
      total,
      page,
      pageSize,
      totalPages: totalPages(total, pageSize),
    }
  }

  async updateUser(id: number, input: UserInput, signal?: AbortSignal): Promise<UserSummary> {
    const dob = formatCalendarDate(this.parseDateOfBirth(input.dob))

    const user = await this.repository.update(id, input.name, dob, signal)
    if (!user) {
      throw new NotFoundError()
    }

    return this.toSummary(user)
  }

  async deleteUser(id: number, signal?: AbortSignal): Promise<void> {
    const deleted = await this.repository.delete(id, signal)
    if (!deleted) {
      throw new NotFoundError()
    }
  }

  private parseDateOfBirth(text: string): CalendarDate {
    const date = parseCalendarDate(text)
    if (!date) {
      throw new InvalidDateError()
    }
    return date
  }

  private today(): CalendarDate {
    return toCalendarDate(this.clock())
  }

  private toSummary(user: User, today?: CalendarDate): UserSummary {
    const summary: UserSummary = {
      id: user.id,
      name: user.name,
      dob: user.dob,
    }

    if (today) {
      summary.age = calculateAge(this.parseDateOfBirth(user.dob), today)
    }

    return summary
  }
}
