import { Aircraft, AircraftOption, Airport, FlightLeg, QuoteResponse, TripRequest } from '../models/charter.model';
import { InvalidRouteError, NoAircraftAvailableError } from '../validators/common';
import { AirportCatalog } from './airports';
import { AircraftCatalog } from './aircraft';
import { Money } from './money';
import { PricingEngine } from './pricing';

/**
 * Turns a trip request into priced options for every aircraft that can seat
 * the party, cheapest first.
 */
export class QuoteBuilder {
  constructor(
    private readonly airports: AirportCatalog,
    private readonly aircraft: AircraftCatalog,
    private readonly pricing: PricingEngine
  ) {}

  build(request: TripRequest): QuoteResponse {
    const origin = this.airports.find(request.origin);
    if (!origin) {
      throw new InvalidRouteError('origin', request.origin);
    }
    const destination = this.airports.find(request.destination);
    if (!destination) {
      throw new InvalidRouteError('destination', request.destination);
    }

    // Both legs fly the same great circle
    const distanceNm = this.pricing.distance(origin, destination);

    const eligible = this.aircraft.filterByCapacity(request.passengers);
    if (eligible.length === 0) {
      throw new NoAircraftAvailableError(request.passengers, this.aircraft.largest().capacity);
    }
    const recommended = this.aircraft.recommend(request.passengers);

    const options = eligible
      .map((aircraft) => this.priceOption(request, aircraft, origin, destination, distanceNm, aircraft.type === recommended.type))
      .sort((a, b) => a.totalPriceUsd.comparedTo(b.totalPriceUsd));

    return {
      tripRequest: request,
      distanceNm,
      aircraftOptions: options,
      recommendedOption: options.find((option) => option.isRecommended) ?? options[0]
    };
  }

  private priceOption(
    request: TripRequest,
    aircraft: Aircraft,
    origin: Airport,
    destination: Airport,
    distanceNm: number,
    isRecommended: boolean
  ): AircraftOption {
    const outboundLeg: FlightLeg = {
      origin: origin.code,
      destination: destination.code,
      distanceNm,
      pricing: this.pricing.priceLeg(distanceNm, aircraft, request.departureDate)
    };

    const returnLeg: FlightLeg | undefined = request.returnDate
      ? {
          origin: destination.code,
          destination: origin.code,
          distanceNm,
          pricing: this.pricing.priceLeg(distanceNm, aircraft, request.returnDate)
        }
      : undefined;

    const totalPriceUsd = outboundLeg.pricing.totalUsd.plus(returnLeg ? returnLeg.pricing.totalUsd : new Money(0));

    return { aircraft, outboundLeg, returnLeg, totalPriceUsd, isRecommended };
  }
}
