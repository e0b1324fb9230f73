import { Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { ChatTurn } from '../chat-memory/types';
import { MAX_DOC_CHARS, truncateDoc } from '../../utils/docMemory';
import { errorMessage } from '../../utils/errors';
import { EMPTY_QUERY_MESSAGE, formatHistory, specialistPrompt } from './prompts';
import { Domain } from './types';

const RAG_TOP_K = 3;

export interface SpecialistProfile {
    domain: Domain;
    /** Config key holding the knowledge-base index name. */
    indexKey: string;
    /** Adjective used in the persona line, e.g. "legal". */
    specialty: string;
    /** Adjective describing the knowledge base, e.g. "legales". */
    knowledgeBase: string;
}

/**
 * Answers a question grounded on the user's document, the domain knowledge
 * base and the recent conversation. The knowledge-base index is checked once at
 * startup; when it is not available, retrieval stays off for the process lifetime.
 */
export abstract class DomainSpecialist implements OnModuleInit {
    private readonly logger: Logger;
    private index: string | null = null;
    private readonly language: string;

    protected constructor(
        private readonly profile: SpecialistProfile,
        private readonly geminiService: GeminiService,
        private readonly retrievalService: RetrievalService,
        private readonly elasticService: ElasticService,
        private readonly configService: ConfigService,
    ) {
        this.logger = new Logger(`${profile.specialty}-specialist`);
        this.language = configService.get<string>('ASSISTANT_LANGUAGE') || 'español (castellano)';
    }

    get domain(): Domain {
        return this.profile.domain;
    }

    get retrievalEnabled(): boolean {
        return this.index !== null;
    }

    async onModuleInit(): Promise<void> {
        const index = this.configService.get<string>(this.profile.indexKey) || '';
        if (!index || !this.elasticService.isConfigured()) {
            this.logger.warn(`${this.profile.indexKey} or ELASTIC_URL not set, knowledge-base retrieval disabled`);
            return;
        }
        try {
            if (await this.elasticService.indexExists(index)) {
                this.index = index;
                this.logger.log(`Knowledge base ready: ${index}`);
            } else {
                this.logger.warn(`Index ${index} not found, knowledge-base retrieval disabled`);
            }
        } catch (error) {
            this.logger.warn(`Could not reach index ${index}, knowledge-base retrieval disabled: ${errorMessage(error)}`);
        }
    }

    async analyze(query: string, documentText: string, messages: readonly ChatTurn[] = []): Promise<string> {
        if (!query.trim()) {
            return EMPTY_QUERY_MESSAGE;
        }

        const prompt = specialistPrompt({
            specialty: this.profile.specialty,
            knowledgeBase: this.profile.knowledgeBase,
            language: this.language,
            history: formatHistory(messages),
            document: truncateDoc(documentText, MAX_DOC_CHARS),
            context: await this.lookup(query),
        });

        const answer = await this.geminiService.invoke([
            { role: 'system', content: prompt },
            { role: 'user', content: query },
        ]);
        return answer.trim();
    }

    private async lookup(query: string): Promise<string> {
        if (!this.index) return '';
        this.logger.log(`RAG lookup index=${this.index}`);
        try {
            return await this.retrievalService.retrieve(this.index, query, { topK: RAG_TOP_K });
        } catch (error) {
            this.logger.warn(`RAG error: ${errorMessage(error)}`);
            return '';
        }
    }
}
