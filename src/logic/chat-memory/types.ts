import { MessageRole } from '../../entities';

export type Role = MessageRole;

export interface ChatMessage {
  id: number;
  conversationId: number;
  role: Role;
  content: string;
  ts: number;
  attachmentName?: string;
}

export interface NewAttachment {
  name?: string;
  data: Buffer;
}

export interface ConversationStats {
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
}
