#!/usr/bin/env tsx
/**
 * Compiler Benchmark Script
 *
 * Runs sample investment queries through the compiler (and optionally the
 * index) and reports timing per phase.
 *
 * Usage:
 *   npm run benchmark
 *   npm run benchmark -- --iterations 5
 *   npm run benchmark -- --query "Large dividend paying stocks in Europe" --with-search
 */

import { config } from 'dotenv';
import { createStockSearch } from '../src/bootstrap.js';
import type { TransformTimings } from '../src/compiler/types.js';
import { loadAppConfig } from '../src/config/app.js';

const projectRoot = process.cwd();

const DEFAULT_QUERIES = [
  'European banks with high dividends',
  'European technology companies with high growth',
  'Large dividend paying stocks in Europe',
  'What does ROE mean?',
];

/**
 * CLI configuration
 */
interface BenchmarkConfig {
  queries: string[];
  iterations: number;
  warmupRuns: number;
  withSearch: boolean;
}

type Phase = keyof TransformTimings | 'searchMs';

const PHASES: Phase[] = ['promptMs', 'modelMs', 'interpretMs', 'totalMs', 'searchMs'];

interface PhaseStats {
  mean: number;
  min: number;
  max: number;
}

interface BenchmarkResult {
  query: string;
  fallbacks: number;
  phases: Partial<Record<Phase, PhaseStats>>;
}

/**
 * Parse CLI arguments
 */
function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2);
  const benchmarkConfig: BenchmarkConfig = {
    queries: [],
    iterations: 3,
    warmupRuns: 1,
    withSearch: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--query' && i + 1 < args.length) {
      benchmarkConfig.queries.push(args[++i]);
    } else if (arg === '--iterations' && i + 1 < args.length) {
      benchmarkConfig.iterations = Math.max(1, parseInt(args[++i], 10) || 1);
    } else if (arg === '--warmup' && i + 1 < args.length) {
      benchmarkConfig.warmupRuns = Math.max(0, parseInt(args[++i], 10) || 0);
    } else if (arg === '--with-search') {
      benchmarkConfig.withSearch = true;
    } else if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    }
  }

  if (benchmarkConfig.queries.length === 0) {
    benchmarkConfig.queries = DEFAULT_QUERIES;
  }

  return benchmarkConfig;
}

function printUsage(): void {
  console.log(`
Compiler Benchmark

Usage:
  npm run benchmark [options]

Options:
  --query <text>       Query to run (repeatable; default: built-in samples)
  --iterations <n>     Measured runs per query (default: 3)
  --warmup <n>         Unmeasured runs per query (default: 1)
  --with-search        Also execute search results against Elasticsearch
  --help, -h           Show this help message
  `);
}

function calculateStats(timings: number[]): PhaseStats {
  if (timings.length === 0) {
    return { mean: 0, min: 0, max: 0 };
  }
  return {
    mean: timings.reduce((sum, t) => sum + t, 0) / timings.length,
    min: Math.min(...timings),
    max: Math.max(...timings),
  };
}

async function main() {
  config();
  const benchmarkConfig = parseArgs();
  const { compiler, index } = createStockSearch(loadAppConfig(projectRoot, process.env));

  const results: BenchmarkResult[] = [];

  for (const query of benchmarkConfig.queries) {
    console.log(`\n📊 ${query}`);

    for (let i = 0; i < benchmarkConfig.warmupRuns; i++) {
      await compiler.transform(query);
    }

    const samples: Record<Phase, number[]> = {
      promptMs: [],
      modelMs: [],
      interpretMs: [],
      totalMs: [],
      searchMs: [],
    };
    let fallbacks = 0;

    for (let i = 0; i < benchmarkConfig.iterations; i++) {
      const outcome = await compiler.transformWithDiagnostics(query);
      samples.promptMs.push(outcome.timings.promptMs);
      samples.modelMs.push(outcome.timings.modelMs);
      samples.interpretMs.push(outcome.timings.interpretMs);
      samples.totalMs.push(outcome.timings.totalMs);

      if (outcome.failure) {
        fallbacks += 1;
        console.log(`   ⚠️  Run ${i + 1}: ${outcome.failure.kind} (${outcome.failure.message})`);
      }

      if (benchmarkConfig.withSearch && outcome.result.kind === 'search') {
        const start = Date.now();
        const hits = await index.execute(outcome.result.query);
        samples.searchMs.push(Date.now() - start);
        console.log(`   ✓ Run ${i + 1}: ${outcome.timings.totalMs}ms compile, ${hits.length} hit(s)`);
      } else {
        console.log(`   ✓ Run ${i + 1}: ${outcome.timings.totalMs}ms compile, ${outcome.result.kind}`);
      }
    }

    const phases: BenchmarkResult['phases'] = {};
    for (const phase of PHASES) {
      if (samples[phase].length > 0) {
        phases[phase] = calculateStats(samples[phase]);
      }
    }
    results.push({ query, fallbacks, phases });
  }

  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('📈 Benchmark Results (ms: mean / min / max)');
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  for (const result of results) {
    console.log(`\n${result.query}`);
    for (const [phase, stats] of Object.entries(result.phases)) {
      console.log(
        `   ${phase.padEnd(12)} ${stats.mean.toFixed(1).padStart(8)} / ${stats.min.toFixed(1).padStart(8)} / ${stats.max.toFixed(1).padStart(8)}`
      );
    }
    if (result.fallbacks > 0) {
      console.log(`   fallbacks    ${result.fallbacks} of ${benchmarkConfig.iterations}`);
    }
  }
  console.log('');
}

main().catch((err) => {
  console.error('\n❌ Benchmark failed:');
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
