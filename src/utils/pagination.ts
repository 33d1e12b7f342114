import { PAGINATION } from './constants'

export interface PageRequest {
  page?: number
  pageSize?: number
}

export interface NormalizedPage {
  page: number
  pageSize: number
}

/**
 * Fill in defaults for an unset or zero page and page size.
 * Bounds are checked by the request validator; nothing is clamped here.
 */
export function normalizePageRequest(request: PageRequest = {}): NormalizedPage {
  return {
    page: request.page || PAGINATION.DEFAULT_PAGE,
    pageSize: request.pageSize || PAGINATION.DEFAULT_PAGE_SIZE,
  }
}

export function pageOffset(page: number, pageSize: number): number {
  return (page - 1) * pageSize
}

export function totalPages(totalRows: number, pageSize: number): number {
  return Math.ceil(totalRows / pageSize)
}
