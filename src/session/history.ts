export type Role = 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
  at: Date;
}

export const TRANSLATION_FAILURE_NOTICE =
  'Could not generate a valid SQL query. Please try rephrasing your question.';

export function formatAssistantSummary(sql: string, rowCount: number): string {
  return `SQL Query:\n\`\`\`sql\n${sql}\n\`\`\`\n\nResults: ${rowCount} rows returned`;
}

/** Append-only record of the conversation. Nothing in the pipeline reads it back. */
export class Transcript {
  private readonly messages: Message[] = [];

  append(role: Role, content: string, at: Date = new Date()): Message {
    const message: Message = { role, content, at };
    this.messages.push(message);
    return message;
  }

  list(): readonly Message[] {
    return this.messages.map((m) => ({ ...m }));
  }

  get size(): number {
    return this.messages.length;
  }
}
