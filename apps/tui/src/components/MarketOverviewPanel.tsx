import { Box, Text } from 'ink';
import type { MarketOverview } from '@marketdesk/types';
import { formatNumber, formatPercent } from '@marketdesk/utils';
import { Panel } from './Panel';
import { changeColor } from './colors';

interface MarketOverviewPanelProps {
  overview: MarketOverview;
}

export function MarketOverviewPanel({ overview }: MarketOverviewPanelProps) {
  return (
    <Panel title="Market Overview">
      <Box flexDirection="column">
        {overview.indices.map((index) => (
          <Text key={index.name}>
            {`${index.name}: ${formatNumber(index.value, 2)} `}
            <Text color={changeColor(index.changePct)}>({formatPercent(index.changePct)})</Text>
          </Text>
        ))}
        <Text>
          {`Advancers ${overview.advances} · Decliners ${overview.declines} · Unchanged ${overview.unchanged}`}
        </Text>
        <Text>
          {`Stocks ${overview.stockCount} · Avg change `}
          <Text color={changeColor(overview.averageChangePct)}>{formatPercent(overview.averageChangePct)}</Text>
          {` · Watchlist ${overview.watchlistCount}`}
        </Text>
        <Text dimColor>Sectors</Text>
        {overview.sectors.map((sector) => (
          <Text key={sector.sector}>
            {`  ${sector.sector} (${sector.stockCount}) `}
            <Text color={changeColor(sector.changePct)}>{formatPercent(sector.changePct)}</Text>
          </Text>
        ))}
      </Box>
    </Panel>
  );
}
