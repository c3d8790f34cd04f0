import {
    BadRequestException,
    Body,
    Controller,
    Get,
    HttpCode,
    Param,
    Post,
    Query,
    Res,
    UploadedFile,
    UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ChatService } from './chat.service';
import { HistoryQueryDto, SendMessageDto, SessionParamsDto } from './dto/chat.dto';

/** The part of the HTTP response `sendMessage` writes to. */
export interface ReplySink {
    readonly writableFinished: boolean;
    json(body: unknown): unknown;
    setHeader(name: string, value: string): unknown;
    flushHeaders(): void;
    write(chunk: string): unknown;
    end(): unknown;
    on(event: 'close', listener: () => void): unknown;
}

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post('sessions')
    startSession() {
        return { sessionId: this.chatService.startSession() };
    }

    @Get('formats')
    supportedFormats() {
        return this.chatService.supportedFormats();
    }

    @Post('sessions/:sessionId/documents')
    @UseInterceptors(FileInterceptor('file'))
    async uploadDocument(@Param() { sessionId }: SessionParamsDto, @UploadedFile() file: Express.Multer.File | undefined) {
        if (!file) {
            throw new BadRequestException('Attach the document as multipart field "file"');
        }
        return this.chatService.uploadDocument(sessionId, {
            fileName: file.originalname,
            size: file.size,
            mimeType: file.mimetype,
            buffer: file.buffer,
        });
    }

    /**
     * With `stream: true` the reply is written as newline-delimited JSON
     * events. Closing the connection cancels the completion.
     */
    @Post('sessions/:sessionId/messages')
    @HttpCode(200)
    async sendMessage(@Param() { sessionId }: SessionParamsDto, @Body() body: SendMessageDto, @Res() res: ReplySink) {
        if (!body.stream) {
            res.json(await this.chatService.reply(sessionId, body.content));
            return;
        }

        const cancel = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                cancel.abort();
            }
        });

        res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache');
        res.flushHeaders();

        for await (const event of this.chatService.streamReply(sessionId, body.content, cancel.signal)) {
            if (cancel.signal.aborted) {
                break;
            }
            res.write(`${JSON.stringify(event)}\n`);
        }
        res.end();
    }

    @Get('sessions/:sessionId/messages')
    async getHistory(@Param() { sessionId }: SessionParamsDto, @Query() { limit }: HistoryQueryDto) {
        return this.chatService.getHistory(sessionId, limit);
    }

    @Get('sessions/:sessionId/stats')
    async getStats(@Param() { sessionId }: SessionParamsDto) {
        return this.chatService.getStats(sessionId);
    }
}
