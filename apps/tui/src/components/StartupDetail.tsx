import { Box, Text } from 'ink';
import type { Startup } from '@marketdesk/types';
import { Panel } from './Panel';
import { Sparkline } from './Sparkline';
import { STATUS_COLORS } from './colors';

const LATEST_EVENTS = 3;

interface StartupDetailProps {
  name: string | null;
  startup: Startup | null;
  isLoading: boolean;
  error: Error | null;
}

/**
 * Newest first, each prefixed with its month.
 */
export function latestEvents(startup: Startup, limit: number = LATEST_EVENTS): string[] {
  return startup.momentum
    .flatMap((point) => (point.events ?? []).map((event) => `${point.month} ${event}`))
    .reverse()
    .slice(0, limit);
}

export function StartupDetail({ name, startup, isLoading, error }: StartupDetailProps) {
  if (name === null) {
    return (
      <Panel title="Detail">
        <Text dimColor>Select a startup</Text>
      </Panel>
    );
  }

  if (error) {
    return (
      <Panel title={name} status="critical">
        <Text color="red">{`Could not load ${name}: ${error.message}`}</Text>
      </Panel>
    );
  }

  if (isLoading || startup === null) {
    return (
      <Panel title={name}>
        <Text dimColor>{`Loading ${name}...`}</Text>
      </Panel>
    );
  }

  const hiring = startup.momentum.map((point) => point.hiring);
  const buzz = startup.momentum.map((point) => point.buzz);
  const events = latestEvents(startup);

  return (
    <Panel title={startup.name}>
      <Box flexDirection="column">
        <Text>{`${startup.sector} · ${startup.stage} · ${startup.country}`}</Text>
        <Text>
          {'Status: '}
          <Text color={STATUS_COLORS[startup.status]}>{startup.status}</Text>
          {` · Signal score ${startup.signalScore.toFixed(1)}`}
        </Text>
        <Text>{startup.overview}</Text>
        <Text>
          {'Hiring '}
          <Sparkline data={hiring} width={12} />
          {'  Buzz '}
          <Sparkline data={buzz} width={12} />
        </Text>
        <Text dimColor>Latest events</Text>
        {events.length === 0 ? (
          <Text dimColor>  none</Text>
        ) : (
          events.map((event, index) => <Text key={index}>{`  ${event}`}</Text>)
        )}
        <Text>{`Notes: ${startup.notes}`}</Text>
      </Box>
    </Panel>
  );
}
