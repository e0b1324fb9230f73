import { ChatTurn } from '../chat-memory/types';
import { Domain } from '../specialists/types';

export type Stage = 'extract' | 'route' | 'specialize' | 'redact';

export type NextStage = Stage | 'end';

/** Per-request record threaded through the stages. Stages never mutate it. */
export interface RunState {
    readonly messages: readonly ChatTurn[];
    readonly filePaths: readonly string[];
    readonly extractedText: string;
    readonly domain: Domain | null;
    readonly specialistAnalysis: string;
    readonly finalResponse: string;
}

export interface StepResult {
    patch: Partial<RunState>;
    next: NextStage;
}

export interface RunInput {
    messages: readonly ChatTurn[];
    filePaths: readonly string[];
    /** Document text remembered from earlier turns. */
    extractedText: string;
}
