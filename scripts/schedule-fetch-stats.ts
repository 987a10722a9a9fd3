/**
 * Scheduler script to run the stats collection daily
 */

import cron from 'node-cron';
import { loadConfig } from '../src/config';
import { FetchArticleStatsJob } from '../src/ingestion/jobs/fetchArticleStatsJob';
import { reportFatal } from './errors';

const config = loadConfig();
const job = new FetchArticleStatsJob(config);

let running = false;

async function runJob() {
  // Runs rewrite whole files; never let two overlap
  if (running) {
    console.warn(`[${new Date().toISOString()}] Previous run still in progress. Skipping this tick.`);
    return;
  }

  running = true;
  console.log(`[${new Date().toISOString()}] Running scheduled stats collection...`);
  try {
    await job.run();
  } catch (error) {
    console.error('Scheduled job failed:');
    reportFatal(error);
  } finally {
    running = false;
  }
}

if (!cron.validate(config.cron)) {
  console.error(`Invalid STATS_CRON expression: ${config.cron}`);
  process.exit(1);
}

// Run immediately on start
void runJob();

cron.schedule(config.cron, runJob, {
  timezone: config.timeZone,
});

console.log(`Stats scheduler started. Job runs on "${config.cron}" (${config.timeZone}).`);
