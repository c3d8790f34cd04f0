import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { ChatMessage, ConversationStats } from '../chat-memory/types';
import { CompletionMessage, GeminiService } from '../gemini/gemini.service';
import { DocumentExtractorService } from '../documents/document-extractor.service';
import { DocumentFormat } from '../documents/types';
import { SocketGateway } from '../socket-gateway/socket.gateway';
import { AppError, CompletionStreamError, ErrorCode, GENERIC_ERROR_MESSAGE, errorMessage, userMessageFor } from '../../utils/errors';
import { documentMessage, interruptedReply, systemPrompt } from './prompt';

export type ChatStreamEvent =
    | { type: 'token'; text: string }
    | { type: 'done'; message: ChatMessage }
    | { type: 'error'; code: ErrorCode | 'InternalError'; message: string; partialText?: string };

export interface IncomingDocument {
    fileName: string;
    size: number;
    mimeType?: string;
    buffer: Buffer;
}

export interface UploadResult {
    message: ChatMessage;
    file: {
        name: string;
        size: number;
        format: DocumentFormat;
        extractedLength: number;
        strategy?: string;
    };
}

const toCompletionMessages = (history: ChatMessage[]): CompletionMessage[] =>
    history.map(({ role, content }) => ({ role, content }));

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        private readonly chatMemoryService: ChatMemoryService,
        private readonly geminiService: GeminiService,
        private readonly documentExtractorService: DocumentExtractorService,
        private readonly socketGateway: SocketGateway,
    ) { }

    startSession(): string {
        return uuidv4();
    }

    supportedFormats() {
        return this.documentExtractorService.supportedFormats();
    }

    /**
     * Extracts an uploaded file and records it as a user message. Extraction
     * failures are thrown as they are and nothing is persisted.
     */
    async uploadDocument(sessionId: string, file: IncomingDocument): Promise<UploadResult> {
        const format = this.documentExtractorService.inspect(file);
        const outcome = await this.documentExtractorService.extract(file.buffer, format);
        if (!outcome.ok) {
            this.logger.warn(`Could not extract ${file.fileName} (${format}): ${outcome.error.code} ${outcome.error.message}`);
            throw outcome.error;
        }

        const conversation = await this.chatMemoryService.ensureConversation(sessionId);
        const message = await this.chatMemoryService.appendMessage(
            conversation.id,
            'user',
            documentMessage(file.fileName, outcome.text),
            { name: file.fileName, data: file.buffer },
        );
        this.publish(sessionId, message);

        return {
            message,
            file: {
                name: file.fileName,
                size: file.size,
                format,
                extractedLength: outcome.text.length,
                ...(outcome.strategy ? { strategy: outcome.strategy } : {}),
            },
        };
    }

    /**
     * One user turn as a stream of events. The reply is persisted once the
     * model finishes. A reply cut off by an upstream failure is persisted with
     * a marker; a reply cancelled through `signal` is not persisted at all.
     */
    async *streamReply(sessionId: string, content: string, signal?: AbortSignal): AsyncGenerator<ChatStreamEvent, void, undefined> {
        let conversationId: number;
        let history: ChatMessage[];
        try {
            ({ conversationId, history } = await this.recordUserTurn(sessionId, content));
        } catch (error) {
            yield this.errorEvent(error);
            return;
        }

        let reply = '';
        try {
            const fragments = this.geminiService.completeStreaming(toCompletionMessages(history), {
                systemInstruction: systemPrompt(),
                signal,
            });
            for await (const text of fragments) {
                reply += text;
                yield { type: 'token', text };
            }
        } catch (error) {
            if (error instanceof CompletionStreamError) {
                await this.saveInterruptedReply(sessionId, conversationId, error.partialText);
                yield { ...this.errorEvent(error), partialText: error.partialText };
                return;
            }
            yield this.errorEvent(error);
            return;
        }

        if (signal?.aborted) {
            this.logger.log(`Reply for session ${sessionId} cancelled after ${reply.length} characters`);
            return;
        }

        try {
            const message = await this.chatMemoryService.appendMessage(conversationId, 'assistant', reply);
            this.publish(sessionId, message);
            yield { type: 'done', message };
        } catch (error) {
            yield this.errorEvent(error);
        }
    }

    /** Non-streaming turn; failures propagate to the exception filter. */
    async reply(sessionId: string, content: string): Promise<ChatMessage> {
        const { conversationId, history } = await this.recordUserTurn(sessionId, content);
        const answer = await this.geminiService.complete(toCompletionMessages(history), {
            systemInstruction: systemPrompt(),
        });
        const message = await this.chatMemoryService.appendMessage(conversationId, 'assistant', answer);
        this.publish(sessionId, message);
        return message;
    }

    async getHistory(sessionId: string, limit?: number): Promise<ChatMessage[]> {
        const conversation = await this.chatMemoryService.findConversation(sessionId);
        if (!conversation) {
            return [];
        }
        return this.chatMemoryService.loadHistory(conversation.id, limit);
    }

    async getStats(sessionId: string): Promise<ConversationStats> {
        const conversation = await this.chatMemoryService.findConversation(sessionId);
        if (!conversation) {
            return { totalMessages: 0, userMessages: 0, assistantMessages: 0 };
        }
        return this.chatMemoryService.getStats(conversation.id);
    }

    private async recordUserTurn(sessionId: string, content: string) {
        const conversation = await this.chatMemoryService.ensureConversation(sessionId);
        const userMessage = await this.chatMemoryService.appendMessage(conversation.id, 'user', content);
        this.publish(sessionId, userMessage);
        const history = await this.chatMemoryService.loadHistory(conversation.id, ChatMemoryService.HISTORY_LIMIT);
        return { conversationId: conversation.id, history };
    }

    private async saveInterruptedReply(sessionId: string, conversationId: number, partialText: string) {
        try {
            const message = await this.chatMemoryService.appendMessage(conversationId, 'assistant', interruptedReply(partialText));
            this.publish(sessionId, message);
        } catch (error) {
            // The completion failure is what gets reported; this one is only logged.
            this.logger.error(`Could not save interrupted reply for session ${sessionId}: ${errorMessage(error)}`);
        }
    }

    private publish(sessionId: string, message: ChatMessage) {
        this.socketGateway.emitToSession(sessionId, 'conversations.message', { sessionId, message });
    }

    private errorEvent(error: unknown): Extract<ChatStreamEvent, { type: 'error' }> {
        if (error instanceof AppError) {
            this.logger.warn(`${error.name} ${error.code}: ${error.message}`);
            return { type: 'error', code: error.code, message: userMessageFor(error) };
        }
        this.logger.error(`Unexpected failure: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
        return { type: 'error', code: 'InternalError', message: GENERIC_ERROR_MESSAGE };
    }
}
