import { Box, Text } from 'ink';
import { fitCell } from '@marketdesk/utils';

export interface Column<T> {
  key: keyof T;
  label: string;
  width: number;
  align?: 'left' | 'right';
  render?: (value: T[keyof T], row: T) => string;
  color?: (row: T) => string | undefined;
}

interface DataTableProps<T> {
  columns: Column<T>[];
  data: readonly T[];
  selectedIndex: number;
  rowKey: (row: T) => string;
  emptyText?: string;
}

const SELECTED_MARKER = '›';

export function DataTable<T extends object>({
  columns,
  data,
  selectedIndex,
  rowKey,
  emptyText = 'No rows',
}: DataTableProps<T>) {
  const header = columns.map((col) => fitCell(col.label.toUpperCase(), col.width, col.align)).join(' ');

  return (
    <Box flexDirection="column">
      <Text dimColor>{`  ${header}`}</Text>

      {data.length === 0 && <Text dimColor>{`  ${emptyText}`}</Text>}

      {data.map((row, rowIndex) => {
        const selected = rowIndex === selectedIndex;
        return (
          <Text key={rowKey(row)} inverse={selected}>
            {selected ? `${SELECTED_MARKER} ` : '  '}
            {columns.map((col, colIndex) => {
              const value = row[col.key];
              const text = col.render ? col.render(value, row) : String(value ?? '');
              const cell = fitCell(text, col.width, col.align);
              return (
                <Text key={String(col.key)} color={col.color?.(row)}>
                  {colIndex === columns.length - 1 ? cell : `${cell} `}
                </Text>
              );
            })}
          </Text>
        );
      })}
    </Box>
  );
}
