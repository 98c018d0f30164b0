import 'dotenv/config';
import { loadSources, parseCliArgs, resolveConfig, USAGE } from './lib/config.js';
import { describeError } from './lib/errors.js';
import { createSummaryPredicate } from './lib/messages.js';
import { OpenAIClient } from './lib/openai.js';
import { runAggregation } from './lib/pipeline.js';
import { TelegramFetcher } from './lib/telegram-client.js';

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = resolveConfig(args, process.env, loadSources(args.config));

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      // Second signal: do not wait for the pending step to unwind
      process.exit(130);
    }
    console.log(`\nReceived ${signal}, stopping...`);
    controller.abort();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  console.log(`Channels: ${config.channels.join(', ')}`);

  const result = await runAggregation(
    {
      source: new TelegramFetcher(config.telegram),
      model: config.openai ? new OpenAIClient(config.openai) : undefined,
    },
    {
      channels: config.channels,
      saveDir: config.saveDir,
      refresh: config.refresh,
      windowHours: config.windowHours,
      timeoutMs: config.timeoutMs,
      summary: {
        channel: config.summary.channel,
        scanLimit: config.summary.scanLimit,
        predicate: createSummaryPredicate(config.summary),
      },
      report: config.report,
      signal: controller.signal,
    }
  );

  const total = Object.values(result.record.channels).reduce((sum, msgs) => sum + msgs.length, 0);
  console.log(`\n${result.fromCache ? 'Loaded' : 'Collected'} ${total} messages for ${result.date}`);
  if (result.filteredPath) console.log(`Filtered: ${result.filteredPath}`);
  if (result.reportPath) console.log(`Report: ${result.reportPath}`);
  console.log('Done!');
}

main().then(
  () => process.exit(0),
  (error) => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  }
);
