import { Module } from '@nestjs/common';
import { DocumentsModule } from '../documents/documents.module';
import { GeminiModule } from '../gemini/gemini.module';
import { SpecialistsModule } from '../specialists/specialists.module';
import { AssistantGraphService } from './assistant-graph.service';

@Module({
    imports: [DocumentsModule, GeminiModule, SpecialistsModule],
    providers: [AssistantGraphService],
    exports: [AssistantGraphService],
})
export class AssistantGraphModule {}
