/**
 * Query Normalizer Tests
 */

import { describe, it, expect } from '@jest/globals';
import { normalizeWaypoints, placeSignature, selectPlaces } from './index.js';
import { createMention } from '../schemas/common.js';
import { candidate } from '../testing/fakes.js';

describe('normalizeWaypoints', () => {
  it('should drop waypoints that are generic locations', () => {
    const waypoints = [createMention('Chicago'), createMention('a diner')];
    const locations = [createMention('Chicago')];

    expect(normalizeWaypoints(waypoints, locations).map((w) => w.text)).toEqual(['a diner']);
  });

  it('should compare normalized text', () => {
    const waypoints = [createMention('CHICAGO'), createMention('a  Diner')];
    const locations = [createMention('Chicago')];

    expect(normalizeWaypoints(waypoints, locations)).toEqual([
      { text: 'a Diner', normalized: 'a diner' },
    ]);
  });

  it('should drop start, end and repeated waypoints', () => {
    const waypoints = [
      createMention('Austin'),
      createMention('a nearby ATM'),
      createMention('a nearby atm'),
      createMention('Dallas'),
      createMention('a pharmacy'),
    ];

    const result = normalizeWaypoints(waypoints, [], [createMention('Dallas'), createMention('Austin')]);

    expect(result.map((w) => w.text)).toEqual(['a nearby ATM', 'a pharmacy']);
  });

  it('should keep waypoints, locations and start/end pairwise disjoint', () => {
    const start = createMention('Dallas');
    const end = createMention('Austin');
    const locations = [createMention('Waco'), createMention('Temple')];
    const waypoints = [
      createMention('waco'),
      createMention('a gas station'),
      createMention('dallas'),
      createMention('a gas station'),
      createMention('austin'),
    ];

    const result = normalizeWaypoints(waypoints, locations, [start, end, null]);
    const keys = [
      ...result.map((w) => w.normalized),
      ...locations.map((l) => l.normalized),
      start.normalized,
      end.normalized,
    ];

    expect(new Set(keys).size).toBe(keys.length);
    expect(result.map((w) => w.normalized)).toEqual(['a gas station']);
  });

  it('should preserve order', () => {
    const waypoints = ['c', 'a', 'b'].map(createMention);

    expect(normalizeWaypoints(waypoints, []).map((w) => w.text)).toEqual(['c', 'a', 'b']);
  });
});

describe('placeSignature', () => {
  it('should join title and address', () => {
    expect(placeSignature({ title: 'Walmart', address: '1 Main St' })).toBe('Walmart|1 Main St');
  });
});

describe('selectPlaces', () => {
  it('should drop closed candidates', () => {
    const places = selectPlaces(
      [candidate('Closed Cafe', '1 A St', { isOpen: false }), candidate('Open Cafe', '2 B St')],
      2
    );

    expect(places.map((p) => p.title)).toEqual(['Open Cafe']);
  });

  it('should keep identical title and address at most once', () => {
    const places = selectPlaces(
      [
        candidate('Walmart', '1 Main St'),
        candidate('Walmart', '1 Main St', { coordinates: { lat: 1, lon: 1 } }),
        candidate('Walmart', '9 Elm St'),
      ],
      5
    );

    expect(places).toEqual([
      { title: 'Walmart', address: '1 Main St', coordinates: { lat: 32.8, lon: -96.8 } },
      { title: 'Walmart', address: '9 Elm St', coordinates: { lat: 32.8, lon: -96.8 } },
    ]);
  });

  it('should keep the first K in collaborator order', () => {
    const places = selectPlaces(
      [candidate('A', 'a'), candidate('B', 'b', { isOpen: false }), candidate('C', 'c'), candidate('D', 'd')],
      2
    );

    expect(places.map((p) => p.title)).toEqual(['A', 'C']);
  });

  it('should return nothing for no candidates', () => {
    expect(selectPlaces([], 2)).toEqual([]);
  });
});
