import { Aircraft } from '../models/charter.model';
import { Money } from '../lib/money';

// Seed data lives in aircraft-types.json, ordered by ascending capacity
import aircraftTypes from './aircraft-types.json';

export const AIRCRAFT_TYPES: readonly Aircraft[] = aircraftTypes.map((entry) => ({
  type: entry.type,
  capacity: entry.capacity,
  baseNmRate: new Money(entry.baseNmRate),
  rangeNm: entry.rangeNm,
  cruiseSpeedKts: entry.cruiseSpeedKts,
  amenities: entry.amenities
}));
