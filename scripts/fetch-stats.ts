/**
 * Manual script to run one stats collection
 */

import { describeConfig, loadConfig } from '../src/config';
import { FetchArticleStatsJob } from '../src/ingestion/jobs/fetchArticleStatsJob';
import { reportFatal } from './errors';

async function main() {
  console.log('🚀 Starting article stats collection...\n');

  const config = loadConfig();
  describeConfig(config).forEach((line) => console.log(`[config] ${line}`));

  const job = new FetchArticleStatsJob(config);
  const result = await job.run();

  console.log('\n📊 Final Results:');
  console.log(`   Articles: ${result.articleCount}`);
  console.log(`   Total views: ${result.totals.totalPv}`);
  console.log(`   Total likes: ${result.totals.totalLike}`);
  console.log(`   Total comments: ${result.totals.totalComment}`);
  if (result.followerCount !== undefined) {
    console.log(`   Followers: ${result.followerCount}`);
  }

  process.exit(0);
}

main().catch((error) => {
  reportFatal(error);
  process.exit(1);
});
