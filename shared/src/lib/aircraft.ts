import { Aircraft } from '../models/charter.model';
import { AIRCRAFT_TYPES } from '../data/aircraft-types';

export function canAccommodate(aircraft: Aircraft, passengers: number): boolean {
  return passengers <= aircraft.capacity;
}

/**
 * Fixed fleet of aircraft types. Catalog order is significant: the table is
 * kept in ascending capacity so the first fit is the smallest one.
 */
export class AircraftCatalog {
  private readonly aircraft: readonly Aircraft[];

  constructor(aircraft: readonly Aircraft[]) {
    if (aircraft.length === 0) {
      throw new Error('Aircraft catalog must contain at least one aircraft type');
    }
    const types = new Set<string>();
    for (const entry of aircraft) {
      if (types.has(entry.type)) {
        throw new Error(`Duplicate aircraft type in catalog: ${entry.type}`);
      }
      types.add(entry.type);
    }
    this.aircraft = [...aircraft];
  }

  get size(): number {
    return this.aircraft.length;
  }

  listAll(): Aircraft[] {
    return [...this.aircraft];
  }

  filterByCapacity(passengers: number): Aircraft[] {
    return this.aircraft.filter((aircraft) => canAccommodate(aircraft, passengers));
  }

  /**
   * Smallest aircraft that fits, or the largest in the fleet when none does.
   * Callers that must actually seat the party check `filterByCapacity`.
   */
  recommend(passengers: number): Aircraft {
    return this.aircraft.find((aircraft) => canAccommodate(aircraft, passengers)) ?? this.largest();
  }

  /** Highest capacity; the later entry wins a tie. */
  largest(): Aircraft {
    return this.aircraft.reduce((largest, aircraft) => (aircraft.capacity >= largest.capacity ? aircraft : largest));
  }
}

export function createDefaultAircraftCatalog(): AircraftCatalog {
  return new AircraftCatalog(AIRCRAFT_TYPES);
}
