import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentExtractorService } from '../documents/document-extractor.service';
import { GeminiService } from '../gemini/gemini.service';
import { DomainSpecialist } from '../specialists/domain-specialist';
import { FinancialSpecialistService } from '../specialists/financial-specialist.service';
import { LegalSpecialistService } from '../specialists/legal-specialist.service';
import { OUT_OF_SCOPE_MESSAGE } from '../specialists/prompts';
import { Domain } from '../specialists/types';
import { lastUserText } from '../chat-memory/types';
import { MAX_DOC_CHARS, truncateDoc } from '../../utils/docMemory';
import { errorMessage } from '../../utils/errors';
import { mentionsTopic } from './keywords';
import {
    APOLOGY_MESSAGE,
    DOMAIN_MARKER,
    INSUFFICIENT_INFO_MESSAGE,
    NO_QUESTION_MESSAGE,
    redactorPrompt,
    routerPrompt,
} from './prompts';
import { NextStage, RunInput, RunState, Stage, StepResult } from './types';

/**
 * extract -> route -> (end | specialize) -> redact -> end
 *
 * Each stage reads the current record and returns a patch plus the next stage;
 * the driver merges patches into a fresh record.
 */
@Injectable()
export class AssistantGraphService {
    private readonly logger = new Logger(AssistantGraphService.name);
    private readonly language: string;
    private readonly specialists: Record<Domain, DomainSpecialist>;

    constructor(
        private readonly documentExtractor: DocumentExtractorService,
        private readonly geminiService: GeminiService,
        legalSpecialist: LegalSpecialistService,
        financialSpecialist: FinancialSpecialistService,
        configService: ConfigService,
    ) {
        this.language = configService.get<string>('ASSISTANT_LANGUAGE') || 'español (castellano)';
        this.specialists = { legal: legalSpecialist, financial: financialSpecialist };
    }

    async run(input: RunInput): Promise<RunState> {
        let state: RunState = {
            messages: input.messages,
            filePaths: input.filePaths,
            extractedText: input.extractedText,
            domain: null,
            specialistAnalysis: '',
            finalResponse: '',
        };
        let stage: NextStage = 'extract';
        while (stage !== 'end') {
            const { patch, next } = await this.step(stage, state);
            state = { ...state, ...patch };
            this.logger.log(`${stage} -> ${next}`);
            stage = next;
        }
        return state;
    }

    private step(stage: Stage, state: RunState): Promise<StepResult> {
        switch (stage) {
            case 'extract':
                return this.extract(state);
            case 'route':
                return this.route(state);
            case 'specialize':
                return this.specialize(state);
            case 'redact':
                return this.redact(state);
        }
    }

    private async extract(state: RunState): Promise<StepResult> {
        const extractedText = await this.documentExtractor.extract(state.filePaths, state.extractedText);
        return { patch: { extractedText }, next: 'route' };
    }

    private async route(state: RunState): Promise<StepResult> {
        const query = lastUserText(state.messages);
        if (!query) {
            return { patch: { finalResponse: NO_QUESTION_MESSAGE }, next: 'end' };
        }

        let response: string;
        try {
            response = await this.geminiService.invoke([
                { role: 'system', content: routerPrompt(truncateDoc(state.extractedText, MAX_DOC_CHARS), this.language) },
                { role: 'user', content: query },
            ]);
        } catch (error) {
            this.logger.error(`Routing failed: ${errorMessage(error)}`);
            return { patch: { finalResponse: APOLOGY_MESSAGE }, next: 'end' };
        }

        const upper = response.toUpperCase().trim();
        if (upper.includes(DOMAIN_MARKER)) {
            const domain: Domain = upper.includes('LEGAL') ? 'legal' : 'financial';
            this.logger.log(`Routing -> ${domain}`);
            return { patch: { domain, finalResponse: '' }, next: 'specialize' };
        }

        // direct answers are only trusted for on-topic questions
        const finalResponse = mentionsTopic(query) ? response.trim() : OUT_OF_SCOPE_MESSAGE;
        return { patch: { finalResponse }, next: finalResponse ? 'end' : 'specialize' };
    }

    private async specialize(state: RunState): Promise<StepResult> {
        const domain = state.domain ?? 'legal';
        const specialist = this.specialists[domain];
        this.logger.log(`Using ${domain} specialist`);
        try {
            const specialistAnalysis = await specialist.analyze(
                lastUserText(state.messages),
                state.extractedText,
                state.messages,
            );
            return { patch: { domain, specialistAnalysis }, next: 'redact' };
        } catch (error) {
            this.logger.error(`Specialist error: ${errorMessage(error)}`);
            return { patch: { domain, specialistAnalysis: APOLOGY_MESSAGE }, next: 'redact' };
        }
    }

    private async redact(state: RunState): Promise<StepResult> {
        if (state.finalResponse) {
            return { patch: {}, next: 'end' };
        }

        const analysis = state.specialistAnalysis.trim();
        if (!analysis) {
            return { patch: { finalResponse: INSUFFICIENT_INFO_MESSAGE }, next: 'end' };
        }

        try {
            const rewritten = await this.geminiService.invoke([
                { role: 'system', content: redactorPrompt(this.language) },
                { role: 'user', content: analysis },
            ]);
            return { patch: { finalResponse: rewritten.trim() || analysis }, next: 'end' };
        } catch (error) {
            this.logger.warn(`Redaction failed, returning the specialist analysis: ${errorMessage(error)}`);
            return { patch: { finalResponse: analysis }, next: 'end' };
        }
    }
}
