import { ProviderError, type ModelProvider } from '../../src/llm/ModelProvider.js';

type ScriptedReply = { output: string } | { error: Error };

export interface RecordedCall {
  systemContext: string;
  userInstruction: string;
}

/**
 * ScriptedModelProvider
 * Test double for ModelProvider that replays queued outputs or failures in
 * FIFO order and records every call.
 */
export class ScriptedModelProvider implements ModelProvider {
  readonly name = 'scripted';
  readonly model: string;
  readonly calls: RecordedCall[] = [];
  private replies: ScriptedReply[] = [];

  constructor(model = 'scripted-model') {
    this.model = model;
  }

  /** Queue raw text for the next invoke call */
  queueOutput(output: string): void {
    this.replies.push({ output });
  }

  /** Queue a JSON-encoded reply */
  queueJson(payload: unknown): void {
    this.queueOutput(JSON.stringify(payload));
  }

  /** Queue a transport failure for the next invoke call */
  queueFailure(message = 'connection reset'): void {
    this.replies.push({ error: new ProviderError(this.name, message) });
  }

  async invoke(systemContext: string, userInstruction: string): Promise<string> {
    this.calls.push({ systemContext, userInstruction });

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`ScriptedModelProvider: no reply queued (call ${this.calls.length})`);
    }
    if ('error' in reply) {
      throw reply.error;
    }
    return reply.output;
  }

  reset(): void {
    this.calls.length = 0;
    this.replies = [];
  }
}
