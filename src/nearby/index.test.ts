import { describe, expect, it } from 'vitest'
import {
  createMockFetch,
  createSearchResponse,
  createTestConfig,
  TEST_SEARCH_URL
} from '../test-support'
import { buildSearchUrl, formatNearbyPlace, readNearbyPlaces, searchNearbyPlaces } from './index'

describe('Nearby Places Module', () => {
  describe('buildSearchUrl', () => {
    it('sends the origin with the fixed radius parameters', () => {
      const mock = createMockFetch(new Map())
      const url = new URL(buildSearchUrl('49931', createTestConfig(mock.fetch)))

      expect(`${url.origin}${url.pathname}`).toBe(TEST_SEARCH_URL)
      expect(url.searchParams.get('key')).toBe('test-key')
      expect(url.searchParams.get('origin')).toBe('49931')
      expect(url.searchParams.get('radius')).toBe('10')
      expect(url.searchParams.get('maxMatches')).toBe('10')
      expect(url.searchParams.get('ambiguities')).toBe('ignore')
      expect(url.searchParams.get('outFormat')).toBe('json')
    })

    it('sends the placeholder origin unchanged', () => {
      const mock = createMockFetch(new Map())
      const url = new URL(buildSearchUrl('No Zipcode', createTestConfig(mock.fetch)))
      expect(url.searchParams.get('origin')).toBe('No Zipcode')
    })
  })

  describe('searchNearbyPlaces', () => {
    it('returns the raw response', async () => {
      const body = createSearchResponse([{ name: 'Keweenaw Coffee', city: 'Houghton' }])
      const mock = createMockFetch(new Map([[TEST_SEARCH_URL, { body }]]))

      const result = await searchNearbyPlaces('49931', createTestConfig(mock.fetch))

      expect(result).toEqual({ ok: true, value: JSON.parse(body) })
      expect(mock.requests).toHaveLength(1)
    })

    it('returns an auth error for a rejected key', async () => {
      const mock = createMockFetch(
        new Map([[TEST_SEARCH_URL, { status: 401, body: 'The AppKey submitted is invalid.' }]])
      )

      const result = await searchNearbyPlaces('49931', createTestConfig(mock.fetch))

      expect(result).toEqual({
        ok: false,
        error: { type: 'auth', message: 'Authentication failed: The AppKey submitted is invalid.' }
      })
    })

    it('returns an error for a non-zero MapQuest status', async () => {
      const body = JSON.stringify({
        info: { statuscode: 400, messages: ['Illegal argument from request: Insufficient info for location'] }
      })
      const mock = createMockFetch(new Map([[TEST_SEARCH_URL, { body }]]))

      const result = await searchNearbyPlaces('No Zipcode', createTestConfig(mock.fetch))

      expect(result).toEqual({
        ok: false,
        error: {
          type: 'invalid_response',
          message: 'MapQuest error: Illegal argument from request: Insufficient info for location'
        }
      })
    })

    it('returns an error for a non-object body', async () => {
      const mock = createMockFetch(new Map([[TEST_SEARCH_URL, { body: '[1, 2]' }]]))
      const result = await searchNearbyPlaces('49931', createTestConfig(mock.fetch))
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.type).toBe('invalid_response')
    })

    it('returns an invalid_response error for malformed JSON', async () => {
      const mock = createMockFetch(new Map([[TEST_SEARCH_URL, { body: '{oops' }]]))
      const result = await searchNearbyPlaces('49931', createTestConfig(mock.fetch))
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('invalid_response')
        expect(result.error.message).toMatch(/^MapQuest response is not valid JSON: /)
      }
    })
  })

  describe('readNearbyPlaces', () => {
    it('reads name, category, address and city', () => {
      const result = JSON.parse(
        createSearchResponse([
          {
            name: 'Keweenaw Coffee',
            category: 'Coffee Shops',
            address: '100 Main St',
            city: 'Houghton'
          }
        ])
      )
      expect(readNearbyPlaces(result)).toEqual([
        { name: 'Keweenaw Coffee', category: 'Coffee Shops', address: '100 Main St', city: 'Houghton' }
      ])
    })

    it('returns empty strings for missing fields', () => {
      expect(readNearbyPlaces({ searchResults: [{ name: 'Trailhead' }] })).toEqual([
        { name: 'Trailhead', category: '', address: '', city: '' }
      ])
    })

    it('returns no places when searchResults is absent', () => {
      expect(readNearbyPlaces({ info: { statuscode: 0 } })).toEqual([])
    })
  })

  describe('formatNearbyPlace', () => {
    it('formats a complete place', () => {
      expect(
        formatNearbyPlace({
          name: 'Keweenaw Coffee',
          category: 'Coffee Shops',
          address: '100 Main St',
          city: 'Houghton'
        })
      ).toBe('- Keweenaw Coffee (Coffee Shops): 100 Main St, Houghton')
    })

    it('substitutes display defaults for empty fields', () => {
      expect(formatNearbyPlace({ name: 'Trailhead', category: '', address: '', city: '' })).toBe(
        '- Trailhead (no category): no address, no city'
      )
    })
  })
})
