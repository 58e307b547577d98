import { Box, Text } from 'ink';
import type { Startup, StartupSummary } from '@marketdesk/types';
import type { Column } from './DataTable';
import { DataTable } from './DataTable';
import { StartupDetail } from './StartupDetail';
import type { DetailState } from './StocksView';
import { STATUS_COLORS } from './colors';

interface StartupsViewProps {
  startups: StartupSummary[] | null;
  isLoading: boolean;
  selectedIndex: number;
  detail: DetailState<Startup>;
}

const columns: Column<StartupSummary>[] = [
  { key: 'name', label: 'Name', width: 16 },
  { key: 'sector', label: 'Sector', width: 18 },
  { key: 'stage', label: 'Stage', width: 9 },
  { key: 'country', label: 'Country', width: 10 },
  { key: 'status', label: 'Status', width: 11, color: (row) => STATUS_COLORS[row.status] },
  { key: 'signalScore', label: 'Score', width: 5, align: 'right', render: (_, row) => row.signalScore.toFixed(1) },
];

export function StartupsView({ startups, isLoading, selectedIndex, detail }: StartupsViewProps) {
  if (startups === null) {
    return <Text dimColor>{isLoading ? 'Loading startups...' : 'No startup data'}</Text>;
  }

  const selected = startups[selectedIndex];

  return (
    <Box flexDirection="column">
      <DataTable
        columns={columns}
        data={startups}
        selectedIndex={selectedIndex}
        rowKey={(row) => row.id}
        emptyText="No startups tracked"
      />
      {selected && <Text dimColor>{selected.description}</Text>}
      <StartupDetail
        name={selected?.name ?? null}
        startup={detail.data}
        isLoading={detail.isLoading}
        error={detail.error}
      />
    </Box>
  );
}
