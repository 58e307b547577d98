import { Box, Text } from 'ink';
import type { PricePoint, Stock, StockSeries, Timeframe } from '@marketdesk/types';
import { formatCurrency } from '@marketdesk/utils';
import { TIMEFRAMES } from '../state/navigation';
import { Panel } from './Panel';
import { Sparkline } from './Sparkline';
import { TREND_COLORS } from './colors';

const SERIES_BY_TIMEFRAME: Record<Timeframe, keyof StockSeries> = {
  '1M': 'oneMonth',
  '6M': 'sixMonth',
  '1Y': 'oneYear',
};

export function seriesFor(stock: Stock, timeframe: Timeframe): PricePoint[] {
  return stock.series[SERIES_BY_TIMEFRAME[timeframe]];
}

interface StockDetailProps {
  ticker: string | null;
  stock: Stock | null;
  timeframe: Timeframe;
  currency: string;
  isLoading: boolean;
  error: Error | null;
}

export function StockDetail({ ticker, stock, timeframe, currency, isLoading, error }: StockDetailProps) {
  if (ticker === null) {
    return (
      <Panel title="Detail">
        <Text dimColor>Select a stock</Text>
      </Panel>
    );
  }

  if (error) {
    return (
      <Panel title={ticker} status="critical">
        <Text color="red">{`Could not load ${ticker}: ${error.message}`}</Text>
      </Panel>
    );
  }

  if (isLoading || stock === null) {
    return (
      <Panel title={ticker}>
        <Text dimColor>{`Loading ${ticker}...`}</Text>
      </Panel>
    );
  }

  const prices = seriesFor(stock, timeframe).map((point) => point.price);

  return (
    <Panel title={stock.ticker}>
      <Box flexDirection="column">
        <Text bold>{stock.name}</Text>
        <Text>{`Sector: ${stock.sector}`}</Text>
        <Text>{`Price: ${formatCurrency(stock.price, 2, currency)}`}</Text>
        <Text>{`Market cap: ${stock.marketCap} · P/E ${stock.pe.toFixed(1)}`}</Text>
        <Text>
          {'Trend: '}
          <Text color={TREND_COLORS[stock.trend]}>{stock.trend}</Text>
        </Text>
        <Text>
          {'Timeframe: '}
          {TIMEFRAMES.map((tf) => (tf === timeframe ? `[${tf}]` : ` ${tf} `)).join(' ')}
        </Text>
        <Text>
          {`${timeframe} price: `}
          <Sparkline data={prices} width={24} />
          {prices.length > 0 &&
            ` ${formatCurrency(Math.min(...prices), 0, currency)} - ${formatCurrency(Math.max(...prices), 0, currency)}`}
        </Text>
      </Box>
    </Panel>
  );
}
