import { isAbsolute, resolve } from 'path';
import { toNumber } from './debug.js';

export interface CompilerConfig {
  projectRoot: string;
  promptsDir: string;
  schemaPath: string;
  maxPageSize: number;
}

const resolvePath = (projectRoot: string, value: string | undefined, fallback: string) => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return resolve(projectRoot, fallback);
  }
  return isAbsolute(trimmed) ? trimmed : resolve(projectRoot, trimmed);
};

export function loadCompilerConfig(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): CompilerConfig {
  return {
    projectRoot,
    promptsDir: resolvePath(projectRoot, env.STOCK_SEARCH_PROMPTS_DIR, 'prompts'),
    schemaPath: resolvePath(
      projectRoot,
      env.STOCK_SEARCH_SCHEMA_PATH,
      'schema/stock-attributes.json'
    ),
    maxPageSize: Math.max(1, Math.floor(toNumber(env.STOCK_SEARCH_MAX_PAGE_SIZE, 100))),
  };
}
