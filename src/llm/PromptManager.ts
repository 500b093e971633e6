import { readFileSync } from 'fs';
import { join } from 'path';

const PLACEHOLDER_PATTERN = /\{\{([a-z_]+)\}\}/g;

/**
 * PromptManager
 * Loads and caches prompt templates from the prompts directory and fills their
 * `{{placeholder}}` slots.
 */
export class PromptManager {
  private promptsDir: string;
  private cache: Map<string, string>;

  constructor(promptsDir: string) {
    this.promptsDir = promptsDir;
    this.cache = new Map();
  }

  /**
   * Load a prompt file by name
   * @param name Prompt file name (without .txt extension)
   */
  getPrompt(name: string): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const filePath = join(this.promptsDir, `${name}.txt`);
    try {
      const content = readFileSync(filePath, 'utf-8').trim();
      this.cache.set(name, content);
      return content;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new Error(`Prompt file not found: ${name}.txt`);
      }
      throw new Error(
        `Failed to load prompt "${name}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Join several prompt files with blank lines and substitute placeholders.
   * @throws Error if a template uses a placeholder that `variables` does not define
   */
  composePrompt(promptNames: string[], variables: Record<string, string> = {}): string {
    const composed = promptNames.map((name) => this.getPrompt(name)).join('\n\n');

    const missing = new Set<string>();
    const rendered = composed.replace(PLACEHOLDER_PATTERN, (placeholder, key: string) => {
      const value = variables[key];
      if (value === undefined) {
        missing.add(key);
        return placeholder;
      }
      return value;
    });

    if (missing.size > 0) {
      throw new Error(`Unresolved prompt placeholders: ${[...missing].join(', ')}`);
    }

    return rendered;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
