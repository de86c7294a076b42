import { Airport } from '../models/charter.model';
import { CHARTER_AIRPORTS, CITY_ALIASES } from '../data/charter-airports';

export type AirportMatchField = 'code' | 'city' | 'alias' | 'partial';

export interface AirportMatch {
  airport: Airport;
  matchedField: AirportMatchField;
}

const MIN_PARTIAL_MATCH_LENGTH = 3;

const normalize = (value: string) => value.trim().toLowerCase();

/**
 * Read-only lookup over a fixed set of airports, by code, city name or alias.
 */
export class AirportCatalog {
  private readonly airports: readonly Airport[];
  private readonly byCode = new Map<string, Airport>();
  // normalized city name -> airports in insertion order
  private readonly byCity = new Map<string, Airport[]>();
  private readonly aliases = new Map<string, string>();

  constructor(airports: readonly Airport[], cityAliases: Readonly<Record<string, string>> = {}) {
    this.airports = [...airports];

    for (const airport of this.airports) {
      const code = airport.code.toUpperCase();
      if (this.byCode.has(code)) {
        throw new Error(`Duplicate airport code in catalog: ${code}`);
      }
      this.byCode.set(code, airport);

      const city = normalize(airport.city);
      const cityAirports = this.byCity.get(city) ?? [];
      cityAirports.push(airport);
      this.byCity.set(city, cityAirports);
    }

    for (const [alias, city] of Object.entries(cityAliases)) {
      this.aliases.set(normalize(alias), normalize(city));
    }
  }

  get size(): number {
    return this.airports.length;
  }

  getByCode(code?: string | null): Airport | undefined {
    if (!code) return undefined;
    return this.byCode.get(code.trim().toUpperCase());
  }

  /**
   * Resolves a free-form token: exact code, then exact city or alias, then
   * (for tokens of 3+ characters) the first city name containing the token.
   */
  find(token?: string | null): Airport | undefined {
    return this.match(token)?.airport;
  }

  match(token?: string | null): AirportMatch | undefined {
    if (!token) return undefined;
    const query = normalize(token);
    if (!query) return undefined;

    const byCode = this.byCode.get(query.toUpperCase());
    if (byCode) {
      return { airport: byCode, matchedField: 'code' };
    }

    const cityAirports = this.byCity.get(query);
    if (cityAirports) {
      return { airport: cityAirports[0], matchedField: 'city' };
    }

    const aliasCity = this.aliases.get(query);
    const aliasAirports = aliasCity ? this.byCity.get(aliasCity) : undefined;
    if (aliasAirports) {
      return { airport: aliasAirports[0], matchedField: 'alias' };
    }

    if (query.length < MIN_PARTIAL_MATCH_LENGTH) {
      return undefined;
    }

    for (const [city, airports] of this.byCity) {
      if (city.includes(query)) {
        return { airport: airports[0], matchedField: 'partial' };
      }
    }

    return undefined;
  }

  listAll(): Airport[] {
    return [...this.airports];
  }

  /**
   * All airports serving a city name or alias.
   */
  listByCity(city: string): Airport[] {
    const query = normalize(city);
    const airports = this.byCity.get(query) ?? this.byCity.get(this.aliases.get(query) ?? '');
    return airports ? [...airports] : [];
  }
}

export function createDefaultAirportCatalog(): AirportCatalog {
  return new AirportCatalog(CHARTER_AIRPORTS, CITY_ALIASES);
}
