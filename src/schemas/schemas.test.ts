/**
 * Unit Tests for the Zod Schemas
 *
 * Tests each schema with valid and invalid data to ensure proper validation.
 */

import { describe, it, expect } from '@jest/globals';

import {
  // Common types
  CoordinatesSchema,
  TextMentionSchema,
  createMention,
  normalizeMention,
  // Trip
  IntentSchema,
  INTENTS,
  LocationResolutionSchema,
  DistanceConstraintSchema,
  TripResultSchema,
  // HERE
  HereDiscoverResponseSchema,
  HereGeocodeResponseSchema,
  HereRouteResponseSchema,
} from './index.js';

// ============================================
// Common Schema Tests
// ============================================

describe('Common Schemas', () => {
  describe('CoordinatesSchema', () => {
    it('should accept valid coordinates', () => {
      expect(CoordinatesSchema.safeParse({ lat: 32.7767, lon: -96.797 }).success).toBe(true);
    });

    it('should reject out-of-range coordinates', () => {
      expect(CoordinatesSchema.safeParse({ lat: 91, lon: 0 }).success).toBe(false);
      expect(CoordinatesSchema.safeParse({ lat: 0, lon: -181 }).success).toBe(false);
    });
  });

  describe('TextMentionSchema', () => {
    it('should reject empty text', () => {
      expect(TextMentionSchema.safeParse({ text: '', normalized: '' }).success).toBe(false);
    });
  });

  describe('normalizeMention', () => {
    it('should lower-case and collapse whitespace', () => {
      expect(normalizeMention('  A   Walmart ')).toBe('a walmart');
    });
  });

  describe('createMention', () => {
    it('should keep casing in text and trim it', () => {
      expect(createMention(' San  Francisco ')).toEqual({
        text: 'San Francisco',
        normalized: 'san francisco',
      });
    });
  });
});

// ============================================
// Trip Schema Tests
// ============================================

describe('Trip Schemas', () => {
  describe('IntentSchema', () => {
    it('should define fifteen intents', () => {
      expect(INTENTS).toHaveLength(15);
    });

    it('should reject unknown intents', () => {
      expect(IntentSchema.safeParse('Multi-Stop').success).toBe(true);
      expect(IntentSchema.safeParse('Teleport').success).toBe(false);
    });
  });

  describe('LocationResolutionSchema', () => {
    it('should require a country code on fallbacks', () => {
      const result = LocationResolutionSchema.safeParse({
        status: 'fallback',
        coordinates: { lat: 32.7767, lon: -96.797 },
        reason: 'not-found',
      });

      expect(result.success).toBe(false);
    });

    it('should accept an unresolved location without coordinates', () => {
      expect(
        LocationResolutionSchema.safeParse({ status: 'unresolved', reason: 'timeout' }).success
      ).toBe(true);
    });

    it('should reject unknown statuses', () => {
      expect(LocationResolutionSchema.safeParse({ status: 'guessed', reason: 'error' }).success).toBe(
        false
      );
    });
  });

  describe('DistanceConstraintSchema', () => {
    it('should only accept miles or kilometres', () => {
      expect(DistanceConstraintSchema.safeParse({ text: '300 miles', value: 300, unit: 'mi' }).success).toBe(
        true
      );
      expect(DistanceConstraintSchema.safeParse({ text: '3 leagues', value: 3, unit: 'lea' }).success).toBe(
        false
      );
    });
  });

  describe('TripResultSchema', () => {
    const trip = {
      query: 'Find a coffee shop',
      intents: [],
      start: {
        text: 'current location',
        normalized: 'current location',
        source: 'default',
        resolution: {
          status: 'fallback',
          coordinates: { lat: 32.7767, lon: -96.797 },
          countryCode: 'USA',
          reason: 'current-location',
        },
      },
      end: null,
      waypoints: [],
      locations: [],
      constraints: { distance: [], time: { times: [], durations: [] } },
      route: null,
      notices: [],
    };

    it('should accept a trip without end or route', () => {
      expect(TripResultSchema.safeParse(trip).success).toBe(true);
    });

    it('should reject a trip without notices', () => {
      const { notices: _notices, ...incomplete } = trip;
      expect(TripResultSchema.safeParse(incomplete).success).toBe(false);
    });
  });
});

// ============================================
// HERE Response Schema Tests
// ============================================

describe('HERE Schemas', () => {
  it('should default missing geocode items to an empty list', () => {
    expect(HereGeocodeResponseSchema.parse({})).toEqual({ items: [] });
  });

  it('should fill discover item defaults', () => {
    const parsed = HereDiscoverResponseSchema.parse({
      items: [{ position: { lat: 1, lng: 2 } }],
    });

    expect(parsed.items[0]).toEqual({
      title: '',
      position: { lat: 1, lng: 2 },
      address: { label: '' },
    });
  });

  it('should reject route sections with a malformed summary', () => {
    const result = HereRouteResponseSchema.safeParse({
      routes: [{ sections: [{ summary: { length: '10 km' } }] }],
    });

    expect(result.success).toBe(false);
  });
});
