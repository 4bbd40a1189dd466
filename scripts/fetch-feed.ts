#!/usr/bin/env npx tsx
/**
 * Fetch one feed without the UI and print what the list would show.
 * Usage: npx tsx scripts/fetch-feed.ts <url>
 */
import { FeedFetcher } from '../src/services/feed-fetcher.js';
import { formatPublished } from '../src/utils/format.js';

async function main() {
  const url = process.argv[2];
  if (!url) {
    console.error('Usage: npx tsx scripts/fetch-feed.ts <url>');
    process.exit(2);
  }

  const fetcher = new FeedFetcher();
  const start = Date.now();
  const feed = await fetcher.fetch(url);
  const elapsed = ((Date.now() - start) / 1000).toFixed(1);

  console.log(`=== ${feed.title} (${feed.items.length} items in ${elapsed}s) ===\n`);

  for (const [i, item] of feed.items.slice(0, 10).entries()) {
    console.log(`${i + 1}. [${formatPublished(item.published)}] ${item.title}`);
    if (item.summary) {
      const summary = item.summary.slice(0, 120);
      console.log(`   ${summary}${item.summary.length > 120 ? '...' : ''}`);
    }
  }
  if (feed.items.length > 10) {
    console.log(`\n... and ${feed.items.length - 10} more`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
