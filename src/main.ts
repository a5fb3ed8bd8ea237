#!/usr/bin/env node
import { CONFIG } from './config';
import { createSearchClient } from './index';
import { priceBounds } from './utils/listing-filters';

async function main() {
  const query = process.argv.slice(2).join(' ').trim();
  if (!query) {
    console.error('Usage: listing-scout <query>');
    process.exit(2);
  }

  console.log(`Environment: ${CONFIG.nodeEnv}`);
  console.log(`Max pages: ${CONFIG.search.maxPages}, concurrency: ${CONFIG.search.concurrency}, failure policy: ${CONFIG.search.failurePolicy}`);

  const client = createSearchClient();
  const result = await client.search(query);
  const { metadata } = result;

  console.log(`\nPages: ${metadata.pagesSucceeded}/${metadata.totalPages}`);
  for (const failure of metadata.failedPages) {
    console.log(`  page ${failure.page} failed: ${failure.message}`);
  }
  console.log(`Listings: ${metadata.totalExtracted} (${metadata.duplicatesDropped} duplicates dropped)`);

  const bounds = priceBounds(result.listings);
  if (bounds) {
    console.log(`Price range: €${bounds.min.toFixed(2)} - €${bounds.max.toFixed(2)}`);
  }

  console.log(JSON.stringify(result.listings, null, 2));
}

main().catch((error) => {
  console.error('Search failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
