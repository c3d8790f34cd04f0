import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { Conversation, Message } from '../../entities';

@Module({
    imports: [TypeOrmModule.forFeature([Conversation, Message])],
    exports: [ChatMemoryService],
    providers: [ChatMemoryService],
})
export class ChatMemoryModule {}
