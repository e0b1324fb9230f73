import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { FileUploadModule } from '../file-upload/file-upload.module';
import { GuardrailModule } from '../guardrail/guardrail.module';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';

@Module({
    imports: [
        ChatMemoryModule,
        FileUploadModule,
        GuardrailModule,
        OrchestratorModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
})
export class ChatModule {}
