import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { StockDetail, seriesFor } from './StockDetail';
import { makeStock } from '../testing/fixtures';
import { plainFrame } from '../testing/frame';

describe('seriesFor', () => {
  it('should pick the series for each timeframe', () => {
    const stock = makeStock();
    expect(seriesFor(stock, '1M')).toHaveLength(2);
    expect(seriesFor(stock, '6M').map((point) => point.price)).toEqual([1000, 1100, 1250.5]);
    expect(seriesFor(stock, '1Y')[0]?.date).toBe('2025-10-16');
  });
});

describe('StockDetail', () => {
  const baseProps = {
    ticker: 'ACME',
    stock: makeStock(),
    timeframe: '6M' as const,
    currency: 'INR',
    isLoading: false,
    error: null,
  };

  it('should render price, valuation and the selected timeframe', () => {
    const { lastFrame } = render(<StockDetail {...baseProps} />);
    const frame = plainFrame(lastFrame);

    expect(frame).toContain('Acme Corp');
    expect(frame).toContain('Price: ₹1,250.50');
    expect(frame).toContain('Market cap: ₹1.2T · P/E 21.3');
    expect(frame).toContain('Trend: Up');
    expect(frame).toContain('Timeframe:  1M  [6M]  1Y');
    expect(frame).toContain('6M price: ▁▄█ ₹1,000 - ₹1,251');
  });

  it('should show a loading line while the stock is fetched', () => {
    const { lastFrame } = render(<StockDetail {...baseProps} stock={null} isLoading />);
    expect(plainFrame(lastFrame)).toContain('Loading ACME...');
  });

  it('should show the error message', () => {
    const { lastFrame } = render(
      <StockDetail {...baseProps} stock={null} error={new Error('Stock not found')} />
    );
    expect(plainFrame(lastFrame)).toContain('Could not load ACME: Stock not found');
  });

  it('should prompt for a selection when no row is highlighted', () => {
    const { lastFrame } = render(<StockDetail {...baseProps} ticker={null} stock={null} />);
    expect(plainFrame(lastFrame)).toContain('Select a stock');
  });
});
