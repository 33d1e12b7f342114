import { describe, it, expect } from 'vitest'
import { normalizePageRequest, pageOffset, totalPages } from './pagination'

describe('pagination', () => {
  describe('normalizePageRequest', () => {
    it('should default a missing page and page size', () => {
      expect(normalizePageRequest({})).toEqual({ page: 1, pageSize: 10 })
      expect(normalizePageRequest()).toEqual({ page: 1, pageSize: 10 })
    })

    it('should treat zero as unset', () => {
      expect(normalizePageRequest({ page: 0, pageSize: 0 })).toEqual({ page: 1, pageSize: 10 })
    })

    it('should keep explicit values', () => {
      expect(normalizePageRequest({ page: 3, pageSize: 25 })).toEqual({ page: 3, pageSize: 25 })
    })
  })

  it('should compute the row offset', () => {
    expect(pageOffset(1, 10)).toBe(0)
    expect(pageOffset(2, 10)).toBe(10)
    expect(pageOffset(4, 25)).toBe(75)
  })

  it('should round the page count up', () => {
    expect(totalPages(0, 10)).toBe(0)
    expect(totalPages(1, 10)).toBe(1)
    expect(totalPages(10, 10)).toBe(1)
    expect(totalPages(15, 10)).toBe(2)
    expect(totalPages(101, 10)).toBe(11)
  })
})
