import type { ReactNode } from 'react';
import { Box, Text } from 'ink';

interface PanelProps {
  title: string;
  children: ReactNode;
  status?: 'normal' | 'warning' | 'critical' | 'success';
}

const statusColors = {
  normal: 'gray',
  warning: 'yellow',
  critical: 'red',
  success: 'green',
} as const;

export function Panel({ title, children, status = 'normal' }: PanelProps) {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor={statusColors[status]} paddingX={1}>
      <Text bold>
        [ {title} ]
        {status !== 'normal' && <Text color={statusColors[status]}> ●</Text>}
      </Text>
      {children}
    </Box>
  );
}
