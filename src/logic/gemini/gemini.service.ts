import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, GoogleGenAI } from '@google/genai';
import { ChatTurn } from '../chat-memory/types';
import { errorMessage } from '../../utils/errors';

@Injectable()
export class GeminiService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly EMBED_MODEL: string;
    private readonly CHAT_MODEL: string;
    private readonly temperature: number;

    constructor(private readonly configService: ConfigService) {
        this.EMBED_MODEL = configService.get<string>('GEMINI_EMBED_MODEL') || 'text-embedding-004';
        this.CHAT_MODEL = configService.get<string>('GEMINI_CHAT_MODEL') || 'gemini-2.5-flash-lite';
        this.temperature = configService.get<number>('GEMINI_TEMPERATURE') ?? 1;
        this.genAI = new GoogleGenAI({ apiKey: configService.get<string>('GEMINI_API_KEY') || '' });
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        try {
            const result = await this.genAI.models.embedContent({ contents: texts, model: this.EMBED_MODEL });
            return (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values) && values.length > 0);
        } catch (error) {
            this.logger.error(`Error generating embeddings: ${errorMessage(error)}`);
            throw new Error(`Failed to generate embeddings: ${errorMessage(error)}`);
        }
    }

    /**
     * Sends an ordered list of turns and returns the model's text.
     * Gemini has no 'system' role: system turns become a preamble in a user turn
     * and 'assistant' maps to 'model'.
     */
    async invoke(turns: ChatTurn[], temperature = this.temperature): Promise<string> {
        const system = turns.filter(t => t.role === 'system').map(t => t.content.trim()).filter(Boolean).join('\n\n');
        const dialogue = turns.filter(t => t.role !== 'system');
        const last = dialogue[dialogue.length - 1];
        if (!last) {
            throw new Error('Cannot invoke the model without a user turn');
        }
        return this.complete(system, last.content, dialogue.slice(0, -1), temperature);
    }

    async complete(system: string, user: string, history: ChatTurn[], temperature = this.temperature): Promise<string> {
        const preamble = system?.trim() ? `${system.trim()}\n\n` : '';

        const hist: Content[] = history.map(m => ({
            role: m.role === 'assistant' ? 'model' : 'user',
            parts: [{ text: m.content }]
        }));

        try {
            const result = await this.genAI.models.generateContent({
                model: this.CHAT_MODEL,
                config: { temperature },
                contents: [
                    // system-as-preamble in first turn (user role)
                    ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
                    ...hist,
                    { role: 'user', parts: [{ text: user }] }
                ]
            });
            return result.text ?? '';
        } catch (error) {
            this.logger.error(`complete error: ${errorMessage(error)}`);
            throw new Error(`Failed to generate content: ${errorMessage(error)}`);
        }
    }
}
