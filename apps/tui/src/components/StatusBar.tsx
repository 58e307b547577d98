import { Text } from 'ink';

export type StatusKind = 'ready' | 'loading' | 'error';

interface StatusBarProps {
  kind: StatusKind;
  message: string;
}

const KIND_COLORS: Record<StatusKind, string> = {
  ready: 'green',
  loading: 'yellow',
  error: 'red',
};

export function StatusBar({ kind, message }: StatusBarProps) {
  return (
    <Text>
      <Text dimColor>STATUS: </Text>
      <Text color={KIND_COLORS[kind]}>{message}</Text>
    </Text>
  );
}
