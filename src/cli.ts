#!/usr/bin/env node
import 'dotenv/config';
import { Argument, Command } from 'commander';
import { generateBlendedTrending } from './pipeline.js';
import { fetchGummyTrending, isSortPeriod, SORT_PERIODS } from './scrapers/index.js';

const program = new Command();

program
  .name('subreddit-trends')
  .description('Blended trending-subreddit lists from subriff.com and GummySearch')
  .version('0.1.0');

program
  .command('subriff', { isDefault: true })
  .description('Score subriff.com trending pages across sizes and periods, print a diversified top 30')
  .action(async () => {
    const start = Date.now();
    // stdout carries only the list; everything else goes to stderr
    const { names, aggregation, errors } = await generateBlendedTrending({
      onError: (err) => console.error(`Warning: ${err}`),
    });

    for (const name of names) {
      console.log(name);
    }

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    console.error(`Done in ${elapsed}s: ${aggregation.subreddits.size} candidates, ${names.length} selected, ${errors.length} failed queries`);
  });

program
  .command('gummy')
  .description('Print the top growth subreddits from GummySearch size pages')
  .addArgument(new Argument('<period>', 'growth window').choices(SORT_PERIODS))
  .option('--limit <n>', 'Names per size page', '7')
  .action(async (period: string, opts: { limit: string }) => {
    if (!isSortPeriod(period)) {
      console.error(`Invalid period "${period}". Must be one of: ${SORT_PERIODS.join(', ')}`);
      process.exit(1);
    }

    const limitPerBin = parseInt(opts.limit, 10);
    if (!Number.isInteger(limitPerBin) || limitPerBin < 1) {
      console.error(`Invalid --limit "${opts.limit}"`);
      process.exit(1);
    }

    const { names, errors } = await fetchGummyTrending(period, { limitPerBin });
    for (const name of names) {
      console.log(name);
    }

    if (errors.length > 0) {
      for (const err of errors) {
        console.error(`ERROR: ${err}`);
      }
      process.exit(1);
    }
  });

await program.parseAsync();
