/**
 * Check the configured cookie without writing any data
 */

import { checkCookieExpiry, describeConfig, loadConfig, logCookieExpiry, validateCookie } from '../src/config';
import { NoteApiClient } from '../src/ingestion/client/noteApiClient';
import { formatDay } from '../src/utils/dates';
import { reportFatal } from './errors';

async function main() {
  console.log('🔍 Checking stats API cookie...\n');

  const config = loadConfig();
  describeConfig(config).forEach((line) => console.log(`[config] ${line}`));

  validateCookie(config.cookie);
  logCookieExpiry(checkCookieExpiry(config.cookieSetDate, formatDay(new Date(), config.timeZone)));

  const client = new NoteApiClient(config);
  const page = await client.verifyAuth();

  console.log('\n📊 First page:');
  console.log(`   Articles on page: ${page.articles.length}`);
  console.log(`   Total views: ${page.totalPv}`);
  console.log(`   Last page: ${page.lastPage ? 'yes' : 'no'}`);
  console.log('\n✅ Cookie is working!');
}

main().catch((error) => {
  reportFatal(error);
  process.exit(1);
});
