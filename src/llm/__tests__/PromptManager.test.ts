import { describe, it, expect } from '@jest/globals';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { PromptManager } from '../PromptManager.js';

function promptsDir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), 'prompts-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, `${name}.txt`), content);
  }
  return dir;
}

describe('PromptManager', () => {
  it('should load and trim a prompt file', () => {
    const manager = new PromptManager(promptsDir({ greeting: '\nHello there.\n\n' }));

    expect(manager.getPrompt('greeting')).toBe('Hello there.');
  });

  it('should serve later reads from the cache until it is cleared', () => {
    const dir = promptsDir({ greeting: 'first' });
    const manager = new PromptManager(dir);

    expect(manager.getPrompt('greeting')).toBe('first');
    writeFileSync(join(dir, 'greeting.txt'), 'second');
    expect(manager.getPrompt('greeting')).toBe('first');

    manager.clearCache();
    expect(manager.getPrompt('greeting')).toBe('second');
  });

  it('should report a missing prompt by file name', () => {
    const manager = new PromptManager(promptsDir({}));

    expect(() => manager.getPrompt('absent')).toThrow('Prompt file not found: absent.txt');
  });

  it('should join prompts with blank lines and fill placeholders', () => {
    const manager = new PromptManager(
      promptsDir({ head: 'Schema {{schema_version}}', tail: 'At most {{max_page_size}} results.' })
    );

    expect(manager.composePrompt(['head', 'tail'], { schema_version: 'v1', max_page_size: '20' })).toBe(
      'Schema v1\n\nAt most 20 results.'
    );
  });

  it('should fail on placeholders without a value', () => {
    const manager = new PromptManager(promptsDir({ head: '{{a}} {{b}} {{a}}' }));

    expect(() => manager.composePrompt(['head'], { b: 'x' })).toThrow('Unresolved prompt placeholders: a');
  });

  it('should fill every placeholder in the bundled compiler prompts', () => {
    const manager = new PromptManager(resolve(process.cwd(), 'prompts'));

    const composed = manager.composePrompt(
      ['query-compiler-base', 'query-compiler-rules', 'query-compiler-examples'],
      { attributes: '- name (text)', schema_version: 'v1', max_page_size: '100' }
    );

    expect(composed).not.toMatch(/\{\{[a-z_]+\}\}/);
    expect(composed).toContain('- name (text)');
  });
});
