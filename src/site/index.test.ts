import { describe, expect, it } from 'vitest'
import {
  composeAddress,
  formatSiteInfo,
  fromStoredFields,
  normalizeSite,
  toStoredFields
} from './index'

describe('Site Module', () => {
  describe('composeAddress', () => {
    it('joins locality and region', () => {
      expect(composeAddress('Houghton', 'MI')).toBe('Houghton, MI')
    })

    it('returns No Address when locality is missing', () => {
      expect(composeAddress(undefined, 'MI')).toBe('No Address')
    })

    it('returns No Address when region is missing', () => {
      expect(composeAddress('Houghton', undefined)).toBe('No Address')
    })

    it('trims surrounding whitespace', () => {
      expect(composeAddress('  Houghton\n', ' MI ')).toBe('Houghton, MI')
    })

    it('joins blank halves as found', () => {
      expect(composeAddress('Houghton', '   ')).toBe('Houghton, ')
      expect(composeAddress('', 'MI')).toBe(', MI')
    })
  })

  describe('normalizeSite', () => {
    const full = {
      name: 'Isle Royale',
      category: 'National Park',
      locality: 'Houghton',
      region: 'MI',
      postalCode: '49931',
      phone: '(906) 482-0984'
    }

    it('keeps every present field', () => {
      expect(normalizeSite(full)).toEqual({
        category: 'National Park',
        name: 'Isle Royale',
        address: 'Houghton, MI',
        postalCode: '49931',
        phone: '(906) 482-0984'
      })
    })

    it('substitutes No Category', () => {
      expect(normalizeSite({ ...full, category: undefined }).category).toBe('No Category')
    })

    it('substitutes No Name', () => {
      expect(normalizeSite({ ...full, name: undefined }).name).toBe('No Name')
    })

    it('substitutes No Zipcode', () => {
      expect(normalizeSite({ ...full, postalCode: undefined }).postalCode).toBe('No Zipcode')
    })

    it('substitutes No Phone', () => {
      expect(normalizeSite({ ...full, phone: undefined }).phone).toBe('No Phone')
    })

    it('keeps blank fields blank instead of substituting', () => {
      const fields = {
        category: ' ',
        name: 'Keweenaw',
        locality: '',
        region: 'MI',
        postalCode: ''
      }
      expect(normalizeSite(fields)).toEqual({
        category: '',
        name: 'Keweenaw',
        address: ', MI',
        postalCode: '',
        phone: 'No Phone'
      })
    })

    it('substitutes every sentinel for an empty bag', () => {
      expect(normalizeSite({})).toEqual({
        category: 'No Category',
        name: 'No Name',
        address: 'No Address',
        postalCode: 'No Zipcode',
        phone: 'No Phone'
      })
    })

    it('returns a frozen record', () => {
      expect(Object.isFrozen(normalizeSite(full))).toBe(true)
    })
  })

  describe('stored fields', () => {
    it('stores the postal code under zipcode', () => {
      const site = normalizeSite({ name: 'Isle Royale', postalCode: '49931' })
      expect(toStoredFields(site)).toEqual({
        category: 'No Category',
        name: 'Isle Royale',
        address: 'No Address',
        zipcode: '49931',
        phone: 'No Phone'
      })
    })

    it('rebuilds the same record', () => {
      const site = normalizeSite({ name: 'Isle Royale', locality: 'Houghton', region: 'MI' })
      expect(fromStoredFields(toStoredFields(site))).toEqual(site)
    })
  })

  describe('formatSiteInfo', () => {
    it('formats name, category, address and zipcode', () => {
      const site = normalizeSite({
        name: 'Isle Royale',
        category: 'National Park',
        locality: 'Houghton',
        region: 'MI',
        postalCode: '49931'
      })
      expect(formatSiteInfo(site)).toBe('Isle Royale (National Park): Houghton, MI 49931')
    })
  })
})
