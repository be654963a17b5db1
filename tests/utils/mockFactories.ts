/**
 * Mock Factories
 * Fake reverse-geocoding oracles and location data for tests
 */

import { EventEmitter } from 'events';
import { ReplyChannel } from '../../routes/responses';
import {
  Coordinate,
  FallbackEntry,
  GeocodeResult,
  ReverseGeocodingOracle,
  TargetLocation,
  createCoordinate
} from '../../services/location/types';

export interface FakeOracle extends ReverseGeocodingOracle {
  query: jest.Mock<Promise<GeocodeResult>, [Coordinate, AbortSignal?]>;
}

/**
 * Oracle answering from a script, one entry per call.
 * An Error entry rejects; the last entry repeats.
 */
export function createScriptedOracle(script: (GeocodeResult | Error)[]): FakeOracle {
  let call = 0;
  return {
    query: jest.fn(async (_coordinate: Coordinate, _signal?: AbortSignal): Promise<GeocodeResult> => {
      const entry = script[Math.min(call, script.length - 1)];
      call++;
      if (entry instanceof Error) {
        throw entry;
      }
      return entry ?? {};
    })
  };
}

export function createFailingOracle(message: string = 'Service unavailable'): FakeOracle {
  return createScriptedOracle([new Error(message)]);
}

/**
 * Oracle that never settles on its own; only useful with a signal or timeout
 */
export function createHangingOracle(): FakeOracle {
  return {
    query: jest.fn((_coordinate: Coordinate, _signal?: AbortSignal) => new Promise<GeocodeResult>(() => undefined))
  };
}

export function createMockTarget(overrides: Partial<TargetLocation> = {}): TargetLocation {
  return {
    coordinate: createCoordinate(64.1466, -21.9426),
    name: 'Reykjavik, Iceland',
    source: 'geocoded',
    ...overrides
  };
}

export const TEST_CATALOG: readonly FallbackEntry[] = [
  { name: 'Alpha Town, Testland', coordinate: createCoordinate(10, 20) },
  { name: 'Beta City, Testland', coordinate: createCoordinate(-15, 45) },
  { name: 'Gamma Village, Testland', coordinate: createCoordinate(30, -60) },
  { name: 'Delta Port, Testland', coordinate: createCoordinate(50, 120) }
];

/**
 * Records what a route handler sends; `disconnect()` emits `close` the way
 * express does when the client goes away before the reply.
 */
export class FakeResponse implements ReplyChannel {
  statusCode = 200;
  body: unknown = undefined;
  writableFinished = false;
  private readonly events = new EventEmitter();

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.finish();
    return this;
  }

  end(): this {
    this.finish();
    return this;
  }

  on(event: 'close', listener: () => void): this {
    this.events.on(event, listener);
    return this;
  }

  disconnect(): void {
    this.events.emit('close');
  }

  private finish(): void {
    this.writableFinished = true;
    this.events.emit('close');
  }
}
