import type Decimal from 'decimal.js';
import { Aircraft, Airport, IsoDate, PricingBreakdown } from '../models/charter.model';
import { Clock, daysBetween, isWeekend, todayIso } from './dates';
import { Money } from './money';

export interface LeadTimeTier {
  maxDaysOut: number; // inclusive
  multiplier: Decimal;
}

export interface PricingSchedule {
  earthRadiusNm: number;
  minBillableNm: number;
  landingFee: Decimal;
  segmentFee: Decimal;
  taxRate: Decimal;
  leadTimeTiers: LeadTimeTier[]; // ascending by maxDaysOut
  standardMultiplier: Decimal;
  weekendMultiplier: Decimal;
}

export const DEFAULT_PRICING_SCHEDULE: PricingSchedule = {
  earthRadiusNm: 3440.065,
  minBillableNm: 250,
  landingFee: new Money('600'),
  segmentFee: new Money('350'),
  taxRate: new Money('0.075'),
  leadTimeTiers: [
    { maxDaysOut: 3, multiplier: new Money('1.30') },
    { maxDaysOut: 7, multiplier: new Money('1.15') }
  ],
  standardMultiplier: new Money('1.00'),
  weekendMultiplier: new Money('1.10')
};

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export class PricingEngine {
  constructor(
    private readonly clock: Clock = () => todayIso(),
    private readonly schedule: PricingSchedule = DEFAULT_PRICING_SCHEDULE
  ) {}

  /**
   * Great-circle distance in nautical miles (haversine).
   */
  distance(origin: Airport, destination: Airport): number {
    const lat1 = toRadians(origin.latitude);
    const lat2 = toRadians(destination.latitude);
    const dLat = lat2 - lat1;
    const dLon = toRadians(destination.longitude) - toRadians(origin.longitude);

    const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
    // sqrt(h) can drift past 1 for antipodal points
    const c = 2 * Math.asin(Math.min(1, Math.sqrt(h)));

    return this.schedule.earthRadiusNm * c;
  }

  leadTimeMultiplier(departureDate: IsoDate, referenceDate: IsoDate = this.clock()): Decimal {
    const daysUntilDeparture = daysBetween(referenceDate, departureDate);
    const tier = this.schedule.leadTimeTiers.find((candidate) => daysUntilDeparture <= candidate.maxDaysOut);
    return tier ? tier.multiplier : this.schedule.standardMultiplier;
  }

  weekendMultiplier(date: IsoDate): Decimal {
    return isWeekend(date) ? this.schedule.weekendMultiplier : this.schedule.standardMultiplier;
  }

  priceLeg(distanceNm: number, aircraft: Aircraft, departureDate: IsoDate): PricingBreakdown {
    const { landingFee, segmentFee, taxRate } = this.schedule;
    const billableNm = Math.max(distanceNm, this.schedule.minBillableNm);

    // Decimal(number) takes the shortest round-trip decimal of the float
    const baseCost = new Money(aircraft.baseNmRate).times(new Money(billableNm));

    const leadTimeMultiplier = this.leadTimeMultiplier(departureDate);
    const weekendMultiplier = this.weekendMultiplier(departureDate);
    const totalMultiplier = leadTimeMultiplier.times(weekendMultiplier);

    const subtotal = baseCost.plus(landingFee).plus(segmentFee).times(totalMultiplier);
    const taxes = subtotal.times(taxRate);

    return {
      billableNm,
      baseNmRate: aircraft.baseNmRate,
      baseCost,
      landingFee,
      segmentFee,
      leadTimeMultiplier,
      weekendMultiplier,
      subtotal,
      taxes,
      totalUsd: subtotal.plus(taxes)
    };
  }
}
