import Decimal from 'decimal.js';
import { earnings, percentageYield, yearlyReturn, yearsHeld } from './metrics.util';
import { toDecimal } from './decimal.util';

describe('metrics', () => {
  const asOf = new Date(2025, 0, 1);

  describe('earnings', () => {
    it('should return price delta times quantity', () => {
      expect(earnings(toDecimal(120), toDecimal(100), 10).toNumber()).toBe(200);
    });

    it('should be negative on a loss', () => {
      expect(earnings(toDecimal('23.98'), toDecimal('30.30'), 425).toString()).toBe('-2686');
    });

    it('should return 0 for zero quantity', () => {
      expect(earnings(toDecimal(50), toDecimal(10), 0).isZero()).toBe(true);
    });

    it('should keep exact decimal cents', () => {
      expect(earnings(toDecimal('0.3'), toDecimal('0.1'), 3).toString()).toBe('0.6');
    });
  });

  describe('percentageYield', () => {
    it('should return appreciation as a percentage of purchase price', () => {
      expect(percentageYield(toDecimal(150), toDecimal(100)).toNumber()).toBe(50);
      expect(percentageYield(toDecimal(75), toDecimal(100)).toNumber()).toBe(-25);
    });

    it('should throw on a zero purchase price', () => {
      expect(() => percentageYield(toDecimal(10), new Decimal(0))).toThrow('Division by zero');
    });
  });

  describe('yearsHeld', () => {
    it('should count whole calendar days over 365.25', () => {
      // 2023-01-01 to 2025-01-01 is 731 days
      expect(yearsHeld(new Date(2023, 0, 1), asOf).toString()).toBe(toDecimal(731).dividedBy('365.25').toString());
      expect(yearsHeld(new Date(2021, 0, 1), asOf).toNumber()).toBe(4);
    });

    it('should ignore the time of day on either date', () => {
      const lateAsOf = new Date(2025, 0, 1, 23, 59);
      const latePurchase = new Date(2024, 11, 31, 23, 0);

      expect(yearsHeld(latePurchase, lateAsOf).toString()).toBe(toDecimal(1).dividedBy('365.25').toString());
    });
  });

  describe('yearlyReturn', () => {
    it('should return exactly 0 for a future purchase date', () => {
      const future = new Date(2026, 5, 1);
      expect(yearlyReturn(toDecimal(200), toDecimal(100), future, asOf).toNumber()).toBe(0);
    });

    it('should return exactly 0 for a purchase dated today', () => {
      const afternoon = new Date(2025, 0, 1, 15, 0);
      expect(yearlyReturn(toDecimal(101), toDecimal(100), asOf, afternoon).toNumber()).toBe(0);
    });

    it('should annualize a purchase one day old over 1/365.25 years', () => {
      const purchased = new Date(2024, 11, 31);
      // 1% over one day
      expect(yearlyReturn(toDecimal(101), toDecimal(100), purchased, asOf).toNumber()).toBeCloseTo(365.25, 10);
    });

    it('should return 25 for a doubled price held four years', () => {
      const purchased = new Date(2021, 0, 1);
      // 100% over four years
      expect(yearlyReturn(toDecimal(200), toDecimal(100), purchased, asOf).toNumber()).toBe(25);
    });

    it('should annualize over whole elapsed days', () => {
      const purchased = new Date(2021, 0, 1);
      // 50% over four years
      expect(yearlyReturn(toDecimal(150), toDecimal(100), purchased, asOf).toNumber()).toBe(12.5);
    });

    it('should not guard a zero purchase price when time has passed', () => {
      const purchased = new Date(2020, 0, 1);
      expect(() => yearlyReturn(toDecimal(10), new Decimal(0), purchased, asOf)).toThrow('Division by zero');
    });
  });
});
