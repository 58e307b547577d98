import { Box, Text } from 'ink';
import type { Tab } from '../state/navigation';
import { TABS } from '../state/navigation';

const TAB_LABELS: Record<Tab, string> = {
  stocks: 'Stocks',
  startups: 'Startups',
};

interface HeaderProps {
  activeTab: Tab;
  asOf?: string;
}

export function Header({ activeTab, asOf }: HeaderProps) {
  return (
    <Box justifyContent="space-between">
      <Box>
        <Text bold color="cyan">
          MARKET DESK
        </Text>
        {TABS.map((tab, index) => (
          <Text key={tab} inverse={tab === activeTab} color={tab === activeTab ? 'cyan' : undefined}>
            {` [${index + 1}] ${TAB_LABELS[tab]} `}
          </Text>
        ))}
      </Box>
      {asOf && <Text dimColor>as of {asOf}</Text>}
    </Box>
  );
}
