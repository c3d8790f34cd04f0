import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GeminiService } from './gemini.service';
import { GeminiController } from './gemini.controller';
import { ChatModelClient, GEMINI_CLIENT } from './gemini.client';

@Module({
    controllers: [GeminiController],
    exports: [GeminiService],
    providers: [
        GeminiService,
        {
            provide: GEMINI_CLIENT,
            inject: [ConfigService],
            useFactory: (configService: ConfigService): ChatModelClient =>
                new GoogleGenAI({ apiKey: configService.getOrThrow<string>('GEMINI_API_KEY') }).models,
        },
    ],
})
export class GeminiModule {}
