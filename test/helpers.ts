import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { CompletionService } from '../src/llm/completion.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'insurance-nl2sql-'));
}

type Reply = string | Error | ((prompt: string) => string);

/** Completion service that answers from a script and records every prompt. */
export class FakeCompletion implements CompletionService {
  readonly name = 'fake';
  readonly prompts: string[] = [];

  constructor(private readonly reply: Reply) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    if (typeof this.reply === 'function') return this.reply(prompt);
    return this.reply;
  }
}

export const FIXED_NOW = new Date('2024-06-15T12:00:00Z');
