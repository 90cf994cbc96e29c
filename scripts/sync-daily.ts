import 'dotenv/config';
import { loadConfig } from '../src/config';
import { exitCodeFor, runSync } from '../src/sync';

async function main() {
  console.log('Starting daily data sync...');

  const config = loadConfig();
  const controller = new AbortController();
  process.on('SIGINT', () => controller.abort());
  process.on('SIGTERM', () => controller.abort());

  const summary = await runSync(
    config,
    { type: 'daily', symbol: process.env.SYNC_SYMBOL || 'BTCUSDT', incremental: process.argv.includes('--incr') },
    { signal: controller.signal }
  );

  console.log(`Daily data sync completed: ${summary.succeeded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`);
  process.exitCode = exitCodeFor(summary);
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
