#!/usr/bin/env tsx
/**
 * Health Check and Diagnostic Tool
 *
 * Validates environment configuration, the schema definition, prompt files and
 * Elasticsearch connectivity.
 *
 * Usage:
 *   npm run health
 */

import { config } from 'dotenv';
import { runHealthChecks, type HealthCheckResult } from '../src/utils/healthCheck.js';

const projectRoot = process.cwd();

/**
 * Print a single health check result
 */
function printResult(result: HealthCheckResult): void {
  const icon = result.status === 'ok' ? '✅' : result.status === 'warn' ? '⚠️ ' : '❌';
  const statusLabel = result.status.toUpperCase().padEnd(5);

  console.log(`${icon} [${statusLabel}] ${result.label}`);

  if (result.details) {
    console.log(`   ${result.details}`);
  }

  if (result.hint) {
    console.log(`   💡 ${result.hint}`);
  }
}

function printSummary(results: HealthCheckResult[]): void {
  const counts = {
    ok: results.filter((r) => r.status === 'ok').length,
    warn: results.filter((r) => r.status === 'warn').length,
    error: results.filter((r) => r.status === 'error').length,
  };

  console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('📊 Summary');
  console.log(`   ✅ ${counts.ok} OK`);
  console.log(`   ⚠️  ${counts.warn} Warning(s)`);
  console.log(`   ❌ ${counts.error} Error(s)`);

  if (counts.error > 0) {
    console.log('\n❌ Health check FAILED');
    console.log('   Fix the errors above before running searches.');
  } else if (counts.warn > 0) {
    console.log('\n⚠️  Health check passed with warnings');
  } else {
    console.log('\n✅ All health checks passed!');
  }
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
}

async function main() {
  config();

  console.log('🏥 Stock Search Health Check\n');
  console.log('Running diagnostics...\n');

  const results = await runHealthChecks(projectRoot, process.env);

  for (const result of results) {
    printResult(result);
  }

  printSummary(results);

  const hasErrors = results.some((r) => r.status === 'error');
  process.exit(hasErrors ? 1 : 0);
}

main().catch((err) => {
  console.error('\n❌ Health check failed:');
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
