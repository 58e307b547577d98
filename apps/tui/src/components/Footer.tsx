import { Text } from 'ink';

const KEY_HINTS = [
  ['1/2', 'tab'],
  ['↑/↓ j/k', 'move'],
  ['t', 'timeframe'],
  ['r', 'refresh'],
  ['q', 'quit'],
] as const;

export function Footer() {
  return (
    <Text dimColor>
      {KEY_HINTS.map(([keys, action]) => `${keys} ${action}`).join('  ·  ')}
    </Text>
  );
}
