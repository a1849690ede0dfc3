export type Role = 'system' | 'user' | 'assistant';

export type Message = {
  readonly role: Role;
  readonly content: string;
};

export function systemMessage(text: string): Message {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(text: string): Message {
  return {
    role: 'user',
    content: text,
  };
}

export function assistantMessage(text: string): Message {
  return {
    role: 'assistant',
    content: text,
  };
}
