export type Role = 'user' | 'assistant' | 'system';

export const ROLES: readonly Role[] = ['user', 'assistant', 'system'];

export interface ChatTurn {
  role: Role;
  content: string;
}

export interface StoredMessage extends ChatTurn {
  id: number;
  createdAt: Date;
}

export interface ConversationSummary {
  id: string;
  title: string | null;
  createdAt: Date;
  messageCount: number;
  lastMessageAt: Date | null;
}

export function toRole(value: string | null | undefined): Role {
  const role = (value ?? '').trim().toLowerCase();
  // unknown roles replay as assistant turns
  return ROLES.find(r => r === role) ?? 'assistant';
}

export function lastUserText(turns: readonly ChatTurn[]): string {
  for (let i = turns.length - 1; i >= 0; i--) {
    if (turns[i].role === 'user') return turns[i].content.trim();
  }
  return '';
}
