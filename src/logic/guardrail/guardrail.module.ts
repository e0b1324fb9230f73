import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { GuardrailService } from './guardrail.service';

@Module({
    imports: [GeminiModule],
    providers: [GuardrailService],
    exports: [GuardrailService],
})
export class GuardrailModule {}
