/**
 * =============================================================================
 * NEARBY FEED TESTS
 * =============================================================================
 */

import { feedService, parseCoordinatePair, rankNearby } from '../modules/feed/feed.service';
import { toRestaurantPayload } from '../modules/catalog/catalog.mapper';
import { MemoryStore } from '../shared/database/memory.store';
import type { Restaurant } from '../shared/database/entities';
import { offsetByMeters } from '../shared/utils/geospatial.utils';
import { createCategory, createRestaurant, createUser, installMemoryStore } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ORIGIN = { latitude: 12.9716, longitude: 77.5946 };
const LAT = String(ORIGIN.latitude);
const LON = String(ORIGIN.longitude);

function at(dxMeters: number, dyMeters: number): { latitude: number; longitude: number } {
  return offsetByMeters(ORIGIN.latitude, ORIGIN.longitude, dxMeters, dyMeters);
}

describe('Nearby feed', () => {
  let store: MemoryStore;
  let northPizza: Restaurant;
  let eastBurgers: Restaurant;
  let corner: Restaurant;
  let distant: Restaurant;

  beforeEach(async () => {
    store = installMemoryStore();
    const pizza = await createCategory(store, 'Pizza');
    const burgers = await createCategory(store, 'Burgers');
    const chinese = await createCategory(store, 'Chinese');

    northPizza = await createRestaurant(store, { name: 'North Pizza', rating: '4.9', categoryIds: [pizza.id], ...at(0, 3000) });
    eastBurgers = await createRestaurant(store, { name: 'East Burgers', rating: '4.0', categoryIds: [burgers.id], ...at(1000, 0) });
    // Inside the ±radius box, about 12.7 km away
    corner = await createRestaurant(store, { name: 'Corner Wok', categoryIds: [chinese.id], ...at(9000, 9000) });
    distant = await createRestaurant(store, { name: 'Far Away', ...at(0, 50000) });
    await createRestaurant(store, { name: 'Closed Cafe', isOpen: false, ...at(0, 500) });
  });

  it('ranks open restaurants within the radius by distance', async () => {
    const feed = await feedService.feed({ lat: LAT, lon: LON });

    expect(feed.origin).toEqual(ORIGIN);
    expect(feed.restaurants.map(entry => entry.restaurant.name)).toEqual(['East Burgers', 'North Pizza']);
    expect(feed.restaurants[0].distanceKm).toBeCloseTo(1.0, 1);
    expect(feed.restaurants[1].distanceKm).toBeCloseTo(3.0, 1);
  });

  it('excludes a restaurant inside the bounding box but beyond the radius', async () => {
    const feed = await feedService.feed({ lat: LAT, lon: LON, radiusKm: 10 });
    const ids = feed.restaurants.map(entry => entry.restaurant.id);

    expect(ids).not.toContain(corner.id);
    expect(ids).not.toContain(distant.id);

    const wider = await feedService.feed({ lat: LAT, lon: LON, radiusKm: 15 });
    expect(wider.restaurants.map(entry => entry.restaurant.id)).toContain(corner.id);
  });

  it('returns only the categories of the returned restaurants', async () => {
    const feed = await feedService.feed({ lat: LAT, lon: LON });

    expect(feed.categories.map(category => category.name)).toEqual(['Burgers', 'Pizza']);
  });

  it('cuts the list to maxResults', async () => {
    const feed = await feedService.feed({ lat: LAT, lon: LON, maxResults: 1 });

    expect(feed.restaurants.map(entry => entry.restaurant.id)).toEqual([eastBurgers.id]);
  });

  it('returns every open restaurant and category without coordinates', async () => {
    const feed = await feedService.feed({});

    expect(feed.origin).toBeNull();
    expect(feed.restaurants.map(entry => entry.restaurant.name)).toEqual([
      'North Pizza',
      'East Burgers',
      'Corner Wok',
      'Far Away',
    ]);
    expect(feed.restaurants.every(entry => entry.distanceKm === undefined)).toBe(true);
    expect(feed.categories.map(category => category.name)).toEqual(['Burgers', 'Chinese', 'Pizza']);
  });

  it('uses the location resolved for the email', async () => {
    const user = await createUser(store);
    await store.repos.locations.upsert(user.id, ORIGIN.latitude, ORIGIN.longitude);

    const feed = await feedService.feed({ email: user.email });

    expect(feed.restaurants.map(entry => entry.restaurant.id)).toEqual([eastBurgers.id, northPizza.id]);
  });

  it('treats a malformed coordinate pair as no coordinates, ignoring the email', async () => {
    const user = await createUser(store);
    await store.repos.locations.upsert(user.id, ORIGIN.latitude, ORIGIN.longitude);

    const feed = await feedService.feed({ lat: 'north', lon: LON, email: user.email });

    expect(feed.origin).toBeNull();
    expect(feed.restaurants).toHaveLength(4);
  });

  it('adds a rounded distance to the payload', () => {
    expect(toRestaurantPayload(eastBurgers, 1.23456).distance_km).toBe(1.23);
    expect(toRestaurantPayload(eastBurgers)).not.toHaveProperty('distance_km');
  });
});

describe('rankNearby', () => {
  function candidate(id: number, rating: string): Restaurant {
    return {
      id,
      name: `R${id}`,
      tags: '',
      rating,
      etaMin: 15,
      etaMax: 30,
      deliveryFree: false,
      isOpen: true,
      latitude: 1,
      longitude: 1,
      imageUrl: '',
      createdAt: new Date('2024-01-01T00:00:00Z'),
      categoryIds: [],
    };
  }

  it('breaks distance ties by the higher rating', () => {
    const ranked = rankNearby({ latitude: 1, longitude: 1 }, [candidate(1, '4.1'), candidate(2, '4.7')], 5, 10);

    expect(ranked.map(entry => entry.restaurant.id)).toEqual([2, 1]);
    expect(ranked[0].distanceKm).toBe(0);
  });
});

describe('parseCoordinatePair', () => {
  it('parses trimmed numbers', () => {
    expect(parseCoordinatePair(' 12.5 ', '-3')).toEqual({ latitude: 12.5, longitude: -3 });
  });

  it('rejects blanks and non-numbers', () => {
    expect(parseCoordinatePair('', '1')).toBeNull();
    expect(parseCoordinatePair('1', 'east')).toBeNull();
  });
});
