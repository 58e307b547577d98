import { Box, Text } from 'ink';
import type { MarketOverview, Stock, StockSummary, Timeframe } from '@marketdesk/types';
import { formatNumber, formatPercent } from '@marketdesk/utils';
import type { Column } from './DataTable';
import { DataTable } from './DataTable';
import { MarketOverviewPanel } from './MarketOverviewPanel';
import { StockDetail } from './StockDetail';
import { TREND_COLORS, changeColor } from './colors';

export interface StocksTabData {
  overview: MarketOverview;
  stocks: StockSummary[];
  watchlist: StockSummary[];
}

export interface DetailState<T> {
  data: T | null;
  isLoading: boolean;
  error: Error | null;
}

interface StocksViewProps {
  data: StocksTabData | null;
  isLoading: boolean;
  selectedIndex: number;
  timeframe: Timeframe;
  detail: DetailState<Stock>;
}

const columns: Column<StockSummary>[] = [
  { key: 'watchlisted', label: '★', width: 1, render: (_, row) => (row.watchlisted ? '★' : ' ') },
  { key: 'ticker', label: 'Ticker', width: 11 },
  { key: 'name', label: 'Name', width: 26 },
  { key: 'price', label: 'Price', width: 10, align: 'right', render: (_, row) => formatNumber(row.price, 2) },
  {
    key: 'changePct',
    label: 'Change',
    width: 8,
    align: 'right',
    render: (_, row) => formatPercent(row.changePct),
    color: (row) => changeColor(row.changePct),
  },
  { key: 'trend', label: 'Trend', width: 5, color: (row) => TREND_COLORS[row.trend] },
];

export function StocksView({ data, isLoading, selectedIndex, timeframe, detail }: StocksViewProps) {
  if (data === null) {
    return <Text dimColor>{isLoading ? 'Loading stocks...' : 'No stock data'}</Text>;
  }

  const selected = data.stocks[selectedIndex];

  return (
    <Box flexDirection="column">
      <MarketOverviewPanel overview={data.overview} />
      <DataTable
        columns={columns}
        data={data.stocks}
        selectedIndex={selectedIndex}
        rowKey={(row) => row.ticker}
        emptyText="No stocks in the catalog"
      />
      <Text>
        <Text dimColor>Watchlist: </Text>
        {data.watchlist.length > 0 ? data.watchlist.map((stock) => stock.ticker).join(', ') : 'empty'}
      </Text>
      <StockDetail
        ticker={selected?.ticker ?? null}
        stock={detail.data}
        timeframe={timeframe}
        currency={data.overview.currency}
        isLoading={detail.isLoading}
        error={detail.error}
      />
    </Box>
  );
}
