/**
 * Extraction Stage Tests
 */

import { describe, it, expect } from '@jest/globals';
import { extractQuery } from './extract.js';
import { PatternEntityTagger } from '../tagger/pattern.js';

const tagger = new PatternEntityTagger();

async function extract(query: string) {
  return extractQuery(query, await tagger.tag(query));
}

describe('extractQuery', () => {
  it('should extract the worked trip request', async () => {
    const extracted = await extract(
      'Plan a trip from Dallas to Austin with a stop at a Walmart and a coffee shop.'
    );

    expect(extracted.intents).toEqual(expect.arrayContaining(['Basic Navigation', 'Multi-Stop']));
    expect(extracted.start.normalized).toBe('dallas');
    expect(extracted.end?.normalized).toBe('austin');
    expect(extracted.waypoints.map((w) => w.normalized)).toEqual(['a walmart', 'a coffee shop']);
  });

  it('should default the start and leave the end absent without from/to', async () => {
    const extracted = await extract('find me something to eat');

    expect(extracted.start).toEqual({
      text: 'current location',
      normalized: 'current location',
      source: 'default',
    });
    expect(extracted.end).toBeNull();
    expect(extracted.waypoints).toEqual([]);
    expect(extracted.locations).toEqual([]);
  });

  it('should move named stops that the tagger found out of the waypoints', async () => {
    const extracted = await extract(
      'Plan a long road trip from New York to Los Angeles with rest stops every 300 miles and a night stay in Chicago and Denver.'
    );

    expect(extracted.start.text).toBe('New York');
    expect(extracted.end?.text).toBe('Los Angeles');
    expect(extracted.locations.map((l) => l.text)).toEqual(['Chicago', 'Denver']);
    expect(extracted.waypoints).toEqual([]);
    expect(extracted.constraints.distance).toEqual([{ text: '300 miles', value: 300, unit: 'mi' }]);
  });

  it('should carry every verbatim distance match into the constraints', async () => {
    const extracted = await extract('rest stops every 0 miles');

    expect(extracted.constraints.distance).toEqual([{ text: '0 miles', value: 0, unit: 'mi' }]);
  });

  it('should collapse repeated waypoint mentions', async () => {
    const extracted = await extract(
      'Find the shortest route from my house to the airport with a quick stop at a nearby ATM.'
    );

    expect(extracted.waypoints.map((w) => w.text)).toEqual(['a nearby ATM']);
    expect(extracted.intents).toEqual(['Basic Navigation', 'Multi-Stop', 'Shortest']);
  });
});
