import { Airport } from '../models/charter.model';

// Seed data lives in charter-airports.json
import charterAirports from './charter-airports.json';

export const CHARTER_AIRPORTS: readonly Airport[] = charterAirports.airports;

/** Lower-case alias -> city name as it appears in CHARTER_AIRPORTS. */
export const CITY_ALIASES: Readonly<Record<string, string>> = charterAirports.cityAliases;
