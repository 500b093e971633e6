import { loadCompilerConfig, type CompilerConfig } from './compiler.js';
import { loadDebugConfig, type DebugConfig } from './debug.js';
import { loadProviderConfig, type ProviderConfig } from './provider.js';
import { loadSearchConfig, type SearchConfig } from './search.js';

export interface AppConfig {
  readonly debug: Readonly<DebugConfig>;
  readonly provider: Readonly<ProviderConfig>;
  readonly compiler: Readonly<CompilerConfig>;
  readonly search: Readonly<SearchConfig>;
}

/**
 * Reads every setting from the environment once. The returned object is frozen
 * and handed to the components that need it; nothing else reads `process.env`.
 */
export function loadAppConfig(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  return Object.freeze({
    debug: Object.freeze(loadDebugConfig(env)),
    provider: Object.freeze(loadProviderConfig(env)),
    compiler: Object.freeze(loadCompilerConfig(projectRoot, env)),
    search: Object.freeze(loadSearchConfig(env)),
  });
}
