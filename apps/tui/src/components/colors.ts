import type { StartupStatus, Trend } from '@marketdesk/types';

export function changeColor(changePct: number): string | undefined {
  if (changePct > 0) return 'green';
  if (changePct < 0) return 'red';
  return undefined;
}

export const TREND_COLORS: Record<Trend, string> = {
  Up: 'green',
  Flat: 'gray',
  Down: 'red',
};

export const STATUS_COLORS: Record<StartupStatus, string> = {
  Interesting: 'green',
  Watch: 'yellow',
  Ignore: 'gray',
};
