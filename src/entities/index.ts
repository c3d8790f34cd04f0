export * from './conversation.entity';
export * from './message.entity';

import { Conversation } from './conversation.entity';
import { Message } from './message.entity';

export const ENTITIES = [Conversation, Message];
