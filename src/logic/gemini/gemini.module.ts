import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';

// Completion and embedding client shared by the router, specialists and retrieval.
@Module({
    providers: [GeminiService],
    exports: [GeminiService],
})
export class GeminiModule {}
