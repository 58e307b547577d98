import { render } from 'ink';
import { createLogger, validateEnv } from '@marketdesk/utils';
import { MarketApiClient } from './api/client';
import { App } from './App';

const env = validateEnv();
// stdout belongs to the terminal UI, so logs go to a file
const logger = createLogger({ service: 'tui', destination: env.TUI_LOG_FILE });

const api = new MarketApiClient({
  baseUrl: env.API_BASE_URL,
  timeoutMs: env.REQUEST_TIMEOUT_MS,
  logger,
});

logger.info({ baseUrl: env.API_BASE_URL, timeoutMs: env.REQUEST_TIMEOUT_MS }, 'Terminal client starting');

const { waitUntilExit } = render(<App api={api} />);

function exitAfterFlush(code: number): void {
  logger.flush(() => process.exit(code));
}

try {
  await waitUntilExit();
  logger.info('Terminal client exited');
  exitAfterFlush(0);
} catch (err) {
  logger.error({ err }, 'Terminal client crashed');
  exitAfterFlush(1);
}
