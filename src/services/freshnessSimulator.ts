/**
 * freshnessSimulator.ts - Canned sensor readings for a listing.
 * Each reading drifts a little from the previous one; no real hardware involved.
 */

import { roundTo } from './geoService';
import { mathRandomSource, RandomSource } from './randomSource';

export interface FreshnessReading {
  listingId: string;
  freshness: number;
  temperatureC: number;
  humidity: number;
  timestamp: string;
}

interface SensorState {
  freshness: number;
  temperatureC: number;
  humidity: number;
}

export const FRESHNESS_FLOOR = 50;
export const HUMIDITY_BOUNDS = { min: 20, max: 90 } as const;

export class FreshnessSimulator {
  private state: SensorState;

  constructor(
    readonly listingId: string,
    private readonly random: RandomSource = mathRandomSource,
    private readonly now: () => Date = () => new Date()
  ) {
    this.state = {
      freshness: random.integer(85, 99),
      temperatureC: roundTo(random.uniform(4.0, 12.0), 1),
      humidity: random.integer(40, 70),
    };
  }

  /** Advances the simulated sensor by one tick and returns the new reading. */
  next(): FreshnessReading {
    const { freshness, temperatureC, humidity } = this.state;
    this.state = {
      freshness: Math.max(FRESHNESS_FLOOR, freshness + this.random.integer(-2, 1)),
      temperatureC: Math.max(0, temperatureC + this.random.uniform(-0.3, 0.3)),
      humidity: Math.min(HUMIDITY_BOUNDS.max, Math.max(HUMIDITY_BOUNDS.min, humidity + this.random.integer(-2, 2))),
    };

    return {
      listingId: this.listingId,
      freshness: this.state.freshness,
      temperatureC: roundTo(this.state.temperatureC, 1),
      humidity: this.state.humidity,
      timestamp: this.now().toISOString(),
    };
  }
}
