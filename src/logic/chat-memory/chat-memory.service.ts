import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Conversation, ConversationMetadata, Message } from '../../entities';
import { StoreError, errorMessage } from '../../utils/errors';
import { isConnectionError } from '../../utils/database';
import { ChatMessage, ConversationStats, NewAttachment, Role } from './types';

function toChatMessage(m: Message): ChatMessage {
  return {
    id: m.id,
    conversationId: m.conversationId,
    role: m.role,
    content: m.content,
    ts: m.createdAt.getTime(),
    ...(m.attachmentName ? { attachmentName: m.attachmentName } : {}),
  };
}

/**
 * Owns the `conversations` and `messages` tables. Every other module goes
 * through here; nothing else writes either entity.
 */
@Injectable()
export class ChatMemoryService {
  static readonly HISTORY_LIMIT = 50; // messages replayed into a prompt
  static readonly MAX_SESSION_ID_LENGTH = 255; // width of conversations.sessionId

  private readonly logger = new Logger(ChatMemoryService.name);

  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepository: Repository<Conversation>,
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
  ) { }

  /**
   * Get-or-create by session id. The insert ignores a unique-key clash, so
   * concurrent callers for one session all read back the same row.
   */
  async ensureConversation(sessionId: string, metadata: ConversationMetadata = {}): Promise<Conversation> {
    // MySQL's INSERT IGNORE would truncate a longer id and match the wrong row.
    if (!sessionId.trim() || sessionId.length > ChatMemoryService.MAX_SESSION_ID_LENGTH) {
      throw new StoreError('InvalidSessionId', `Session id must be 1-${ChatMemoryService.MAX_SESSION_ID_LENGTH} characters, got ${sessionId.length}`);
    }
    return this.guard('ensureConversation', async () => {
      await this.conversationRepository
        .createQueryBuilder()
        .insert()
        .into(Conversation)
        .values({ sessionId, metadata })
        .orIgnore()
        .updateEntity(false)
        .execute();
      return this.conversationRepository.findOneByOrFail({ sessionId });
    });
  }

  async findConversation(sessionId: string): Promise<Conversation | null> {
    return this.guard('findConversation', () => this.conversationRepository.findOneBy({ sessionId }));
  }

  async appendMessage(conversationId: number, role: Role, content: string, attachment?: NewAttachment): Promise<ChatMessage> {
    return this.guard('appendMessage', () =>
      this.messageRepository.manager.transaction(async (manager) => {
        const conversation = await manager.findOneBy(Conversation, { id: conversationId });
        if (!conversation) {
          throw new StoreError('UnknownConversation', `Conversation ${conversationId} does not exist`);
        }

        const message = await manager.save(
          manager.create(Message, {
            conversationId,
            role,
            content,
            attachment: attachment?.data ?? null,
            attachmentName: attachment?.name ?? null,
          }),
        );
        await manager.update(Conversation, { id: conversationId }, { updatedAt: new Date() });

        this.logger.log(`Saved ${role} message ${message.id} in conversation ${conversationId}`);
        return toChatMessage(message);
      }),
    );
  }

  /**
   * Oldest-first history. With `limit`, the newest `limit` messages are kept
   * and still returned oldest-first.
   */
  async loadHistory(conversationId: number, limit?: number): Promise<ChatMessage[]> {
    if (limit !== undefined && limit <= 0) {
      return [];
    }
    return this.guard('loadHistory', async () => {
      if (limit === undefined) {
        const msgs = await this.messageRepository.find({
          where: { conversationId },
          order: { createdAt: 'ASC', id: 'ASC' },
        });
        return msgs.map(toChatMessage);
      }

      const newest = await this.messageRepository.find({
        where: { conversationId },
        order: { createdAt: 'DESC', id: 'DESC' },
        take: limit,
      });
      return newest.reverse().map(toChatMessage);
    });
  }

  /** Raw bytes of an uploaded document, not loaded with the history. */
  async getAttachment(messageId: number): Promise<Buffer | null> {
    return this.guard('getAttachment', async () => {
      const row = await this.messageRepository.findOne({
        where: { id: messageId },
        select: { id: true, attachment: true },
      });
      // sql.js hands blobs back as a plain Uint8Array.
      return row?.attachment ? Buffer.from(row.attachment) : null;
    });
  }

  async updateMetadata(conversationId: number, metadata: ConversationMetadata): Promise<Conversation> {
    return this.guard('updateMetadata', async () => {
      const conversation = await this.conversationRepository.findOneBy({ id: conversationId });
      if (!conversation) {
        throw new StoreError('UnknownConversation', `Conversation ${conversationId} does not exist`);
      }
      conversation.metadata = metadata;
      conversation.updatedAt = new Date();
      return this.conversationRepository.save(conversation);
    });
  }

  async getStats(conversationId: number): Promise<ConversationStats> {
    return this.guard('getStats', async () => {
      const [userMessages, assistantMessages] = await Promise.all([
        this.messageRepository.countBy({ conversationId, role: 'user' }),
        this.messageRepository.countBy({ conversationId, role: 'assistant' }),
      ]);
      return { totalMessages: userMessages + assistantMessages, userMessages, assistantMessages };
    });
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      if (isConnectionError(error)) {
        this.logger.error(`${operation} failed, database unreachable: ${errorMessage(error)}`);
        throw new StoreError('StorageUnavailable', `${operation}: database unreachable`, { cause: error });
      }
      this.logger.error(`${operation} failed: ${errorMessage(error)}`);
      throw error;
    }
  }
}
