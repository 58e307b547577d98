import { Text } from 'ink';
import { asciiSparkline } from '@marketdesk/utils';

interface SparklineProps {
  data: readonly number[];
  width?: number;
}

export function Sparkline({ data, width = 20 }: SparklineProps) {
  if (data.length === 0) return <Text dimColor>no data</Text>;

  const last = data[data.length - 1] ?? 0;
  const previous = data[data.length - 2] ?? last;

  return <Text color={last - previous >= 0 ? 'green' : 'red'}>{asciiSparkline(data, width)}</Text>;
}
