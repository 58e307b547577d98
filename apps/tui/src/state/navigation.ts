import type { Key } from 'ink';
import type { Timeframe } from '@marketdesk/types';

export type Tab = 'stocks' | 'startups';

export const TABS: readonly Tab[] = ['stocks', 'startups'];

export const TIMEFRAMES: readonly Timeframe[] = ['1M', '6M', '1Y'];

export interface NavigationState {
  tab: Tab;
  /** Highlighted row of the active tab's table */
  selectedRowIndex: number;
  /** Rows currently loaded for the active tab; 0 while loading */
  rowCount: number;
  /** Price series shown in the stock detail panel */
  timeframe: Timeframe;
}

export type NavigationAction =
  | { type: 'switchTab'; tab: Tab }
  | { type: 'moveUp' }
  | { type: 'moveDown' }
  | { type: 'cycleTimeframe' }
  | { type: 'rowsLoaded'; rowCount: number };

export type KeyCommand =
  | Exclude<NavigationAction, { type: 'rowsLoaded' }>
  | { type: 'refresh' }
  | { type: 'quit' };

export const INITIAL_NAVIGATION_STATE: NavigationState = {
  tab: 'stocks',
  selectedRowIndex: 0,
  rowCount: 0,
  timeframe: '6M',
};

function clampIndex(index: number, rowCount: number): number {
  if (rowCount <= 0) return 0;
  return Math.min(Math.max(index, 0), rowCount - 1);
}

export function navigationReducer(state: NavigationState, action: NavigationAction): NavigationState {
  switch (action.type) {
    case 'switchTab':
      if (action.tab === state.tab) return state;
      // The new tab starts from its first row until its data arrives
      return { ...state, tab: action.tab, selectedRowIndex: 0, rowCount: 0 };

    case 'moveUp':
      return { ...state, selectedRowIndex: clampIndex(state.selectedRowIndex - 1, state.rowCount) };

    case 'moveDown':
      return { ...state, selectedRowIndex: clampIndex(state.selectedRowIndex + 1, state.rowCount) };

    case 'cycleTimeframe': {
      const next = (TIMEFRAMES.indexOf(state.timeframe) + 1) % TIMEFRAMES.length;
      return { ...state, timeframe: TIMEFRAMES[next] ?? '6M' };
    }

    case 'rowsLoaded': {
      const rowCount = Math.max(0, Math.floor(action.rowCount));
      return { ...state, rowCount, selectedRowIndex: clampIndex(state.selectedRowIndex, rowCount) };
    }
  }
}

/**
 * Map a key press to a command. Unbound keys yield null.
 */
export function keyToCommand(input: string, key: Pick<Key, 'upArrow' | 'downArrow' | 'ctrl'>): KeyCommand | null {
  if (key.upArrow) return { type: 'moveUp' };
  if (key.downArrow) return { type: 'moveDown' };
  if (key.ctrl && input === 'c') return { type: 'quit' };

  switch (input) {
    case '1':
      return { type: 'switchTab', tab: 'stocks' };
    case '2':
      return { type: 'switchTab', tab: 'startups' };
    case 'k':
      return { type: 'moveUp' };
    case 'j':
      return { type: 'moveDown' };
    case 't':
      return { type: 'cycleTimeframe' };
    case 'r':
      return { type: 'refresh' };
    case 'q':
      return { type: 'quit' };
    default:
      return null;
  }
}
