import { describe, it, expect } from 'vitest';
import {
  formatCurrency,
  formatNumber,
  formatPercent,
  round,
  clamp,
  mean,
  fitCell,
  asciiSparkline,
} from './formatting';

describe('Formatting Utilities', () => {
  describe('formatCurrency', () => {
    it('should format USD by default', () => {
      expect(formatCurrency(1234.5)).toBe('$1,234.50');
    });

    it('should format rupee prices', () => {
      expect(formatCurrency(2945.1, 2, 'INR')).toBe('₹2,945.10');
    });

    it('should honour the decimals argument', () => {
      expect(formatCurrency(99.999, 0)).toBe('$100');
    });
  });

  describe('formatNumber', () => {
    it('should group thousands', () => {
      expect(formatNumber(24781.35, 2)).toBe('24,781.35');
    });
  });

  describe('formatPercent', () => {
    it('should prefix positive values with +', () => {
      expect(formatPercent(1.234)).toBe('+1.23%');
    });

    it('should keep the minus sign on negative values', () => {
      expect(formatPercent(-0.5)).toBe('-0.50%');
    });

    it('should treat zero as positive', () => {
      expect(formatPercent(0)).toBe('+0.00%');
    });
  });

  describe('round', () => {
    it('should round to two decimals by default', () => {
      expect(round(1.23456)).toBe(1.23);
    });

    it('should round to the requested precision', () => {
      expect(round(1.26, 1)).toBe(1.3);
    });
  });

  describe('clamp', () => {
    it('should bound values on both sides', () => {
      expect(clamp(-1, 0, 4)).toBe(0);
      expect(clamp(9, 0, 4)).toBe(4);
      expect(clamp(2, 0, 4)).toBe(2);
    });
  });

  describe('mean', () => {
    it('should return 0 for an empty list', () => {
      expect(mean([])).toBe(0);
    });

    it('should average the values', () => {
      expect(mean([1, 2, 3, 6])).toBe(3);
    });
  });

  describe('fitCell', () => {
    it('should pad short text to the width', () => {
      expect(fitCell('TCS', 6)).toBe('TCS   ');
    });

    it('should right-align when asked', () => {
      expect(fitCell('12.5', 6, 'right')).toBe('  12.5');
    });

    it('should cut long text with an ellipsis', () => {
      expect(fitCell('Reliance Industries', 8)).toBe('Relianc…');
    });
  });

  describe('asciiSparkline', () => {
    it('should return an empty string for no data', () => {
      expect(asciiSparkline([])).toBe('');
    });

    it('should map the minimum and maximum to the lowest and highest blocks', () => {
      expect(asciiSparkline([1, 8])).toBe('▁█');
    });

    it('should render a flat series with the lowest block', () => {
      expect(asciiSparkline([5, 5, 5])).toBe('▁▁▁');
    });

    it('should sample long series down to the width', () => {
      const data = Array.from({ length: 40 }, (_, i) => i);
      expect(asciiSparkline(data, 20)).toHaveLength(20);
    });
  });
});
