import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule, MulterModuleOptions } from '@nestjs/platform-express';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { GeminiModule } from '../gemini/gemini.module';
import { DocumentsModule } from '../documents/documents.module';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../documents/document-format';

/** Multer stops reading an upload as soon as it passes the size limit. */
export const uploadLimits = (configService: ConfigService): MulterModuleOptions => ({
    limits: {
        fileSize: configService.get<number>('MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
        files: 1,
    },
});

@Module({
    imports: [
        MulterModule.registerAsync({ inject: [ConfigService], useFactory: uploadLimits }),
        ChatMemoryModule,
        GeminiModule,
        DocumentsModule,
        SocketGatewayModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
