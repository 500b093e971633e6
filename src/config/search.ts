import { toBool, toNumber } from './debug.js';

export interface SearchConfig {
  url: string;
  index: string;
  username: string;
  password?: string;
  verifyCerts: boolean;
  resultSize: number;
  maxRetries: number;
}

export function loadSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const url = env.ELASTICSEARCH_URL?.trim() || 'https://localhost:9200';

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`ELASTICSEARCH_URL is not a valid URL: ${url}`);
  }

  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new Error('ELASTICSEARCH_URL must use http:// or https://');
  }

  const password = env.ELASTICSEARCH_PASSWORD?.trim();

  return {
    url,
    index: env.ELASTICSEARCH_INDEX?.trim() || 'stocks',
    username: env.ELASTICSEARCH_USERNAME?.trim() || 'elastic',
    ...(password ? { password } : {}),
    verifyCerts: toBool(env.ELASTICSEARCH_VERIFY_CERTS, true),
    resultSize: Math.max(1, Math.floor(toNumber(env.STOCK_SEARCH_RESULT_SIZE, 10))),
    maxRetries: Math.max(0, Math.floor(toNumber(env.ELASTICSEARCH_MAX_RETRIES, 2))),
  };
}
