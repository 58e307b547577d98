import { useEffect, useReducer } from 'react';
import { Box, useApp, useInput } from 'ink';
import type { MarketApi } from './api/client';
import { useRemoteData } from './hooks/useRemoteData';
import {
  INITIAL_NAVIGATION_STATE,
  keyToCommand,
  navigationReducer,
} from './state/navigation';
import type { NavigationState } from './state/navigation';
import { Footer } from './components/Footer';
import { Header } from './components/Header';
import { StartupsView } from './components/StartupsView';
import { StatusBar } from './components/StatusBar';
import type { StatusKind } from './components/StatusBar';
import { StocksView } from './components/StocksView';
import type { StocksTabData } from './components/StocksView';

interface AppProps {
  api: MarketApi;
  initialState?: NavigationState;
}

async function loadStocksTab(api: MarketApi, signal: AbortSignal): Promise<StocksTabData> {
  const overview = await api.getStocksOverview(signal);
  const stocks = await api.listStocks(signal);
  const watchlist = await api.listWatchlist(signal);
  return { overview, stocks, watchlist };
}

export function App({ api, initialState = INITIAL_NAVIGATION_STATE }: AppProps) {
  const { exit } = useApp();
  const [nav, dispatch] = useReducer(navigationReducer, initialState);

  const stocksTab = useRemoteData(nav.tab === 'stocks' ? 'stocks' : null, (_, signal) =>
    loadStocksTab(api, signal)
  );
  const startupsTab = useRemoteData(nav.tab === 'startups' ? 'startups' : null, (_, signal) =>
    api.listStartups(signal)
  );
  const activeTab = nav.tab === 'stocks' ? stocksTab : startupsTab;

  const rowCount = nav.tab === 'stocks' ? stocksTab.data?.stocks.length : startupsTab.data?.length;
  useEffect(() => {
    if (rowCount !== undefined) {
      dispatch({ type: 'rowsLoaded', rowCount });
    }
  }, [rowCount, nav.tab]);

  const selectedTicker =
    nav.tab === 'stocks' ? stocksTab.data?.stocks[nav.selectedRowIndex]?.ticker ?? null : null;
  const selectedStartupId =
    nav.tab === 'startups' ? startupsTab.data?.[nav.selectedRowIndex]?.id ?? null : null;

  const stockDetail = useRemoteData(selectedTicker, (ticker, signal) => api.getStock(ticker, signal));
  const startupDetail = useRemoteData(selectedStartupId, (id, signal) => api.getStartup(id, signal));

  useInput((input, key) => {
    const command = keyToCommand(input, key);
    if (command === null) return;

    switch (command.type) {
      case 'quit':
        exit();
        return;
      case 'refresh':
        activeTab.refetch();
        return;
      default:
        dispatch(command);
    }
  });

  let statusKind: StatusKind = 'ready';
  let statusMessage = 'Ready';
  const tabLabel = nav.tab === 'stocks' ? 'Stocks' : 'Startups';
  if (activeTab.isLoading) {
    statusKind = 'loading';
    statusMessage = `Fetching ${tabLabel.toLowerCase()}...`;
  } else if (activeTab.error) {
    statusKind = 'error';
    statusMessage = `${tabLabel} error: ${activeTab.error.message} (r to retry)`;
  }

  return (
    <Box flexDirection="column">
      <Header activeTab={nav.tab} asOf={stocksTab.data?.overview.asOf} />
      {nav.tab === 'stocks' ? (
        <StocksView
          data={stocksTab.data}
          isLoading={stocksTab.isLoading}
          selectedIndex={nav.selectedRowIndex}
          timeframe={nav.timeframe}
          detail={stockDetail}
        />
      ) : (
        <StartupsView
          startups={startupsTab.data}
          isLoading={startupsTab.isLoading}
          selectedIndex={nav.selectedRowIndex}
          detail={startupDetail}
        />
      )}
      <StatusBar kind={statusKind} message={statusMessage} />
      <Footer />
    </Box>
  );
}
