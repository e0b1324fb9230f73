import { Injectable, Logger } from '@nestjs/common';
import { AssistantGraphService } from '../assistant-graph/assistant-graph.service';
import { APOLOGY_MESSAGE } from '../assistant-graph/prompts';
import { ChatTurn, toRole } from '../chat-memory/types';
import { encodeDocMemory, lastDocMemory, MAX_DOC_CHARS, stripDocMemory, truncateDoc } from '../../utils/docMemory';
import { errorMessage } from '../../utils/errors';

export interface HistoryEntry {
    role: string;
    content: string;
}

@Injectable()
export class OrchestratorService {
    private readonly logger = new Logger(OrchestratorService.name);

    constructor(private readonly assistantGraph: AssistantGraphService) {}

    /**
     * Runs one turn. The reply carries the accumulated document text in its
     * memory wrapper so the next turn can pick it up from history.
     */
    async respond(userQuery: string, filePaths: readonly string[], history: readonly HistoryEntry[] = []): Promise<string> {
        const previousDoc = truncateDoc(lastDocMemory(history), MAX_DOC_CHARS);

        const messages: ChatTurn[] = [];
        for (const entry of history) {
            const content = stripDocMemory(entry.content);
            if (!content) continue;
            messages.push({ role: toRole(entry.role), content });
        }
        messages.push({ role: 'user', content: userQuery.trim() });

        try {
            const result = await this.assistantGraph.run({ messages, filePaths, extractedText: previousDoc });
            return encodeDocMemory(result.finalResponse.trim(), truncateDoc(result.extractedText.trim(), MAX_DOC_CHARS));
        } catch (error) {
            this.logger.error(`Assistant run failed: ${errorMessage(error)}`);
            return encodeDocMemory(APOLOGY_MESSAGE, previousDoc);
        }
    }
}
