import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../gemini/gemini.service';
import { errorMessage } from '../../utils/errors';
import { GUARDRAIL_REJECTION, GUARDRAIL_SYSTEM } from './prompts';

export type GuardrailVerdict =
    | { accepted: true }
    | { accepted: false; reason: string };

/** Topic gate for the opening message of a conversation. */
@Injectable()
export class GuardrailService {
    private readonly logger = new Logger(GuardrailService.name);

    constructor(private readonly geminiService: GeminiService) {}

    async validate(query: string, hasFiles: boolean): Promise<GuardrailVerdict> {
        // attachments signal a document question
        if (hasFiles) return { accepted: true };

        try {
            const res = await this.geminiService.invoke([
                { role: 'system', content: GUARDRAIL_SYSTEM },
                { role: 'user', content: query },
            ]);
            if (res.toUpperCase().includes('ACCEPT')) return { accepted: true };
            this.logger.log(`Rejected opening query: ${query.slice(0, 80)}`);
            return { accepted: false, reason: GUARDRAIL_REJECTION };
        } catch (error) {
            this.logger.warn(`Guardrail unavailable, accepting query: ${errorMessage(error)}`);
            return { accepted: true };
        }
    }
}
