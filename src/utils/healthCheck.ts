/**
 * Health Check Utilities
 *
 * Reusable checks for the environment, the schema definition, the prompt
 * files and Elasticsearch connectivity.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { QUERY_COMPILER_PROMPTS } from '../compiler/PromptCompiler.js';
import { loadCompilerConfig } from '../config/compiler.js';
import { API_KEY_VARIABLES, isProviderName, PROVIDER_NAMES } from '../config/provider.js';
import { loadSearchConfig, type SearchConfig } from '../config/search.js';
import { SchemaDefinitionError, SchemaRegistry } from '../schema/SchemaRegistry.js';
import { ElasticsearchIndexClient } from '../search/ElasticsearchIndexClient.js';

export type HealthStatus = 'ok' | 'warn' | 'error';

export interface HealthCheckResult {
  checkId: string;
  label: string;
  status: HealthStatus;
  details?: string;
  hint?: string;
}

/**
 * Helper functions to create health check results
 */
export function ok(checkId: string, label: string, details?: string): HealthCheckResult {
  return { checkId, label, status: 'ok', details };
}

export function warn(
  checkId: string,
  label: string,
  details?: string,
  hint?: string
): HealthCheckResult {
  return { checkId, label, status: 'warn', details, hint };
}

export function error(
  checkId: string,
  label: string,
  details?: string,
  hint?: string
): HealthCheckResult {
  return { checkId, label, status: 'error', details, hint };
}

/**
 * Check the .env file, the model provider selection and its API key, and the
 * Elasticsearch URL
 */
export function checkEnv(projectRoot: string, env: NodeJS.ProcessEnv): HealthCheckResult[] {
  const results: HealthCheckResult[] = [];

  // Warn only: variables can come from the shell
  if (!existsSync(join(projectRoot, '.env'))) {
    results.push(
      warn('env:file', '.env file', 'Not found', 'Create .env or ensure variables are set in your shell')
    );
  } else {
    results.push(ok('env:file', '.env file', 'Found'));
  }

  const provider = env.LLM_PROVIDER?.trim().toLowerCase() || 'openai';
  if (!isProviderName(provider)) {
    results.push(
      error(
        'env:provider',
        'LLM_PROVIDER',
        `Unsupported value "${provider}"`,
        `Set LLM_PROVIDER to one of: ${PROVIDER_NAMES.join(', ')}`
      )
    );
  } else {
    results.push(ok('env:provider', 'LLM_PROVIDER', provider));

    const keyVariable = API_KEY_VARIABLES[provider];
    if (!env[keyVariable]?.trim()) {
      results.push(
        error(
          'env:api-key',
          keyVariable,
          'Not set',
          `Set ${keyVariable}; every search needs a model call`
        )
      );
    } else {
      results.push(ok('env:api-key', keyVariable, 'Set'));
    }
  }

  const url = env.ELASTICSEARCH_URL?.trim();
  if (!url) {
    results.push(
      warn(
        'env:elasticsearch-url',
        'ELASTICSEARCH_URL',
        'Not set, using https://localhost:9200',
        'Set ELASTICSEARCH_URL to your cluster address'
      )
    );
  } else {
    try {
      loadSearchConfig(env);
      results.push(ok('env:elasticsearch-url', 'ELASTICSEARCH_URL', censorPassword(url)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      results.push(error('env:elasticsearch-url', 'ELASTICSEARCH_URL', message));
    }
  }

  if (!env.ELASTICSEARCH_PASSWORD?.trim()) {
    results.push(
      warn(
        'env:elasticsearch-password',
        'ELASTICSEARCH_PASSWORD',
        'Not set',
        'Set ELASTICSEARCH_PASSWORD unless the cluster allows anonymous access'
      )
    );
  }

  return results;
}

/**
 * Safely censor credentials embedded in a URL
 */
export function censorPassword(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    if (url.password) {
      url.password = '****';
    }
    return url.toString();
  } catch {
    return rawUrl.replace(/:[^:/@]*@/, ':****@');
  }
}

/**
 * Check that the attribute definition loads
 */
export function checkSchema(schemaPath: string): HealthCheckResult {
  try {
    const registry = SchemaRegistry.load(schemaPath);
    return ok(
      'schema:definition',
      'Schema definition',
      `Version ${registry.version}, ${registry.describe().size} field paths`
    );
  } catch (err) {
    if (err instanceof SchemaDefinitionError) {
      return error(
        'schema:definition',
        'Schema definition',
        err.problems.join('; '),
        `Fix ${schemaPath} or point STOCK_SEARCH_SCHEMA_PATH at a valid definition`
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    return error('schema:definition', 'Schema definition', message);
  }
}

/**
 * Check that every prompt file the compiler composes is present
 */
export function checkPrompts(promptsDir: string): HealthCheckResult {
  const missing = QUERY_COMPILER_PROMPTS.filter((name) => !existsSync(join(promptsDir, `${name}.txt`)));

  if (missing.length > 0) {
    return error(
      'prompts:files',
      'Prompt files',
      `Missing: ${missing.map((name) => `${name}.txt`).join(', ')}`,
      `Restore the files in ${promptsDir} or set STOCK_SEARCH_PROMPTS_DIR`
    );
  }

  return ok('prompts:files', 'Prompt files', `${QUERY_COMPILER_PROMPTS.length} found in ${promptsDir}`);
}

/**
 * Check Elasticsearch connectivity
 */
export async function checkSearchConnection(
  client: Pick<ElasticsearchIndexClient, 'ping'>
): Promise<HealthCheckResult> {
  try {
    const reachable = await client.ping();
    if (!reachable) {
      return error('search:connection', 'Elasticsearch connection', 'Ping returned no answer');
    }
    return ok('search:connection', 'Elasticsearch connection', 'Reachable');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (message.includes('ECONNREFUSED')) {
      return error(
        'search:connection',
        'Elasticsearch connection',
        'Connection refused',
        'Elasticsearch is not running at ELASTICSEARCH_URL. Start it with: docker run -d -p 9200:9200 -e discovery.type=single-node elasticsearch:8.15.0'
      );
    }

    if (message.includes('401') || message.toLowerCase().includes('security_exception')) {
      return error(
        'search:connection',
        'Elasticsearch connection',
        'Authentication failed',
        'Check ELASTICSEARCH_USERNAME and ELASTICSEARCH_PASSWORD'
      );
    }

    if (message.toLowerCase().includes('certificate')) {
      return error(
        'search:connection',
        'Elasticsearch connection',
        'TLS certificate rejected',
        'Install the cluster CA or set ELASTICSEARCH_VERIFY_CERTS=false for local clusters'
      );
    }

    return error('search:connection', 'Elasticsearch connection', message);
  }
}

/**
 * Run all health checks
 */
export async function runHealthChecks(
  projectRoot: string,
  env: NodeJS.ProcessEnv
): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];

  results.push(...checkEnv(projectRoot, env));

  const compilerConfig = loadCompilerConfig(projectRoot, env);
  const schemaCheck = checkSchema(compilerConfig.schemaPath);
  results.push(schemaCheck);
  results.push(checkPrompts(compilerConfig.promptsDir));

  // The index client needs the registry for field addressing
  if (schemaCheck.status === 'error') {
    return results;
  }

  let searchConfig: SearchConfig;
  try {
    searchConfig = loadSearchConfig(env);
  } catch {
    // Reported by checkEnv
    return results;
  }

  const registry = SchemaRegistry.load(compilerConfig.schemaPath);
  results.push(await checkSearchConnection(ElasticsearchIndexClient.fromConfig(searchConfig, registry)));

  return results;
}
