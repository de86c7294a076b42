import { createDefaultAircraftCatalog } from './aircraft';
import { createDefaultAirportCatalog } from './airports';
import { PricingEngine } from './pricing';

const airports = createDefaultAirportCatalog();
const [veryLightJet, lightJet, , , heavyJet] = createDefaultAircraftCatalog().listAll();

function airport(code: string) {
  const found = airports.getByCode(code);
  if (!found) throw new Error(`missing test airport ${code}`);
  return found;
}

describe('PricingEngine', () => {
  // 2026-03-02 is a Monday
  const engine = new PricingEngine(() => '2026-03-02');

  describe('distance', () => {
    it('should measure the great circle in nautical miles', () => {
      const distance = engine.distance(airport('JFK'), airport('LAX'));
      expect(distance).toBeCloseTo(2145.97, 2);
      expect(Math.abs(distance - 2151)).toBeLessThan(10);
    });

    it('should stay finite for antipodal points', () => {
      const point = { code: 'AAA', city: 'North', latitude: 10, longitude: 20 };
      const antipode = { code: 'BBB', city: 'South', latitude: -10, longitude: -160 };
      const distance = engine.distance(point, antipode);

      expect(Number.isFinite(distance)).toBe(true);
      expect(distance).toBeCloseTo(Math.PI * 3440.065, 2);
    });

    it('should be symmetric and zero for the same airport', () => {
      expect(engine.distance(airport('LAX'), airport('JFK'))).toBeCloseTo(engine.distance(airport('JFK'), airport('LAX')), 9);
      expect(engine.distance(airport('SEA'), airport('SEA'))).toBe(0);
    });
  });

  describe('leadTimeMultiplier', () => {
    it('should step down at 3 and 7 days out', () => {
      expect(engine.leadTimeMultiplier('2026-03-02').toString()).toBe('1.3');
      expect(engine.leadTimeMultiplier('2026-03-05').toString()).toBe('1.3');
      expect(engine.leadTimeMultiplier('2026-03-06').toString()).toBe('1.15');
      expect(engine.leadTimeMultiplier('2026-03-09').toString()).toBe('1.15');
      expect(engine.leadTimeMultiplier('2026-03-10').toString()).toBe('1');
    });

    it('should price past departures at the short-notice rate', () => {
      expect(engine.leadTimeMultiplier('2026-02-20').toString()).toBe('1.3');
    });

    it('should accept an explicit reference date', () => {
      expect(engine.leadTimeMultiplier('2026-03-20', '2026-03-18').toString()).toBe('1.3');
    });
  });

  it('should surcharge Saturdays and Sundays only', () => {
    expect(engine.weekendMultiplier('2026-03-07').toString()).toBe('1.1');
    expect(engine.weekendMultiplier('2026-03-08').toString()).toBe('1.1');
    expect(engine.weekendMultiplier('2026-03-06').toString()).toBe('1');
  });

  describe('priceLeg', () => {
    it('should bill short hops at the minimum distance', () => {
      const pricing = engine.priceLeg(engine.distance(airport('JFK'), airport('LGA')), lightJet, '2026-03-16');

      expect(pricing.billableNm).toBe(250);
      expect(pricing.baseCost.toString()).toBe('2750');
      expect(pricing.landingFee.toString()).toBe('600');
      expect(pricing.segmentFee.toString()).toBe('350');
      expect(pricing.subtotal.toString()).toBe('3700');
      expect(pricing.taxes.toString()).toBe('277.5');
      expect(pricing.totalUsd.toString()).toBe('3977.5');
    });

    it('should apply multipliers to base cost plus fees before tax', () => {
      // Thursday reference, Saturday departure: 1.30 x 1.10
      const shortNotice = new PricingEngine(() => '2026-03-05');
      const pricing = shortNotice.priceLeg(100, lightJet, '2026-03-07');

      expect(pricing.leadTimeMultiplier.times(pricing.weekendMultiplier).toString()).toBe('1.43');
      expect(pricing.subtotal.toString()).toBe('5291');
      expect(pricing.taxes.toString()).toBe('396.825');
      expect(pricing.totalUsd.toString()).toBe('5687.825');
    });

    it('should use the one-week tier at exactly seven days', () => {
      const pricing = engine.priceLeg(250, lightJet, '2026-03-09');
      expect(pricing.totalUsd.toString()).toBe('4574.125');
    });

    it('should keep the unrounded distance in the base cost', () => {
      const distance = engine.distance(airport('JFK'), airport('LAX'));
      const pricing = engine.priceLeg(distance, veryLightJet, '2026-03-16');

      expect(pricing.billableNm).toBe(distance);
      expect(pricing.totalUsd.toDecimalPlaces(2).toString()).toBe('21783.51');
    });

    it('should price the floor leg for the largest aircraft', () => {
      expect(engine.priceLeg(10, heavyJet, '2026-03-16').totalUsd.toString()).toBe('5858.75');
    });
  });
});
