/**
 * Shared exit handling for the runnable scripts
 */

import { ConfigError } from '../src/config';
import { StatsApiError } from '../src/ingestion/client/noteApiClient';

export function reportFatal(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(`🚨 ${error.message}`);
  } else if (error instanceof StatsApiError) {
    console.error(`🚨 ${error.message}`);
    if (error.kind === 'auth' || error.kind === 'malformed') {
      console.error('  → The cookie looks invalid. Copy the Cookie header again from the browser DevTools.');
    }
  } else {
    console.error('Fatal error:', error);
  }
}
