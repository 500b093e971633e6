#!/usr/bin/env tsx
/**
 * Interactive stock search
 *
 * Type an investment query, see the structured query it compiled to, the
 * best matching stocks and any aggregation buckets.
 *
 * Usage:
 *   npm run search
 *   npm run search -- "European banks with high dividends"
 */

import { createInterface } from 'readline/promises';
import { config } from 'dotenv';
import { createStockSearch } from '../src/bootstrap.js';
import { loadAppConfig } from '../src/config/app.js';
import type { SearchHit } from '../src/search/SearchIndexClient.js';
import type { StockSearchService } from '../src/search/StockSearchService.js';

const EXIT_COMMANDS = new Set(['quit', 'exit', 'q']);

const projectRoot = process.cwd();

function formatPercent(value: unknown): string {
  return typeof value === 'number' ? `${(value * 100).toFixed(2)}%` : 'n/a';
}

function formatHit(hit: SearchHit, position: number): string {
  const { fields } = hit;
  const name = typeof fields.name === 'string' ? fields.name : (hit.id ?? 'unnamed');
  const sector = typeof fields.equity_sector === 'string' ? fields.equity_sector : 'n/a';
  return [
    `${position}. ${name}`,
    `   Sector: ${sector} | ROE: ${formatPercent(fields.roe_ttm)} | Dividend yield: ${formatPercent(fields.div_yield_ttm)} | Score: ${hit.score.toFixed(2)}`,
  ].join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAggregation(name: string, result: unknown): string[] {
  if (!isRecord(result)) {
    return [`${name}: n/a`];
  }
  if (Array.isArray(result.buckets)) {
    const lines = [`${name}:`];
    for (const bucket of result.buckets) {
      if (isRecord(bucket)) {
        lines.push(`   ${String(bucket.key)}: ${String(bucket.doc_count)}`);
      }
    }
    return lines;
  }
  return [`${name}: ${typeof result.value === 'number' ? result.value.toFixed(4) : 'n/a'}`];
}

async function runQuery(service: StockSearchService, text: string): Promise<void> {
  const outcome = await service.search(text);

  if (outcome.kind === 'answer') {
    console.log(`\n💬 ${outcome.text}\n`);
    return;
  }

  if (outcome.text) {
    console.log(`\n💬 ${outcome.text}`);
  }
  console.log('\n🔎 Structured query:');
  console.log(JSON.stringify(outcome.query, null, 2));

  if (outcome.aggregations) {
    console.log('\n📊 Aggregations:');
    for (const [name, result] of Object.entries(outcome.aggregations)) {
      formatAggregation(name, result).forEach((line) => console.log(line));
    }
  }

  if (outcome.hits.length === 0) {
    console.log('\nNo matching stocks.\n');
    return;
  }

  console.log(`\n📈 Top ${outcome.hits.length} of ${outcome.total} result(s):`);
  outcome.hits.forEach((hit, index) => console.log(formatHit(hit, index + 1)));
  console.log('');
}

async function main() {
  config();

  const { service } = createStockSearch(loadAppConfig(projectRoot, process.env));

  const oneShot = process.argv.slice(2).join(' ').trim();
  if (oneShot) {
    await runQuery(service, oneShot);
    return;
  }

  console.log('📊 Stock Search');
  console.log('Describe the stocks you are looking for. Type "quit" to leave.\n');

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      const line = (await rl.question('query> ')).trim();
      if (!line) {
        continue;
      }
      if (EXIT_COMMANDS.has(line.toLowerCase())) {
        break;
      }

      try {
        await runQuery(service, line);
      } catch (err) {
        console.error(`\n❌ ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error('\n❌ Stock search failed to start:');
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
