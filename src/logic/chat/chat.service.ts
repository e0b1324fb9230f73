import { BadRequestException, HttpException, HttpStatus, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { ConversationSummary, StoredMessage } from '../chat-memory/types';
import { FileUploadService } from '../file-upload/file-upload.service';
import { GuardrailService } from '../guardrail/guardrail.service';
import { OrchestratorService } from '../orchestrator/orchestrator.service';
import { stripDocMemory } from '../../utils/docMemory';
import { errorMessage } from '../../utils/errors';
import { AskDto, AskResponse, CreateConversationResponse } from './dto/chat.dto';
import { INTENTS, Intent, intentConfirmation, WELCOME_MESSAGE } from './prompts';

const HISTORY_LIMIT = 50;
const MESSAGES_LIMIT = 200;

function asIntent(query: string): Intent | undefined {
    const q = query.trim().toLowerCase();
    return INTENTS.find(i => i === q);
}

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(private readonly chatMemoryService: ChatMemoryService,
        private readonly orchestratorService: OrchestratorService,
        private readonly guardrailService: GuardrailService,
        private readonly fileUploadService: FileUploadService) { }

    async ask(body: AskDto, files: Express.Multer.File[] = []): Promise<AskResponse> {
        const query = body.query ?? '';
        const conversation = await this.chatMemoryService.ensureConversation(body.conversationId);
        const conversationId = conversation.id;

        // the opening message goes through the topic gate and may only declare the intent
        if (await this.chatMemoryService.countMessages(conversationId) === 0) {
            const verdict = await this.guardrailService.validate(query, files.length > 0);
            if (!verdict.accepted) {
                throw new BadRequestException({ message: verdict.reason, code: 'GUARDRAIL_REJECTED', rejected: true });
            }

            const intent = asIntent(query);
            if (intent) {
                await this.chatMemoryService.appendMessage(conversationId, 'user', query);
                await this.chatMemoryService.appendMessage(conversationId, 'system', `intent:${intent}`);
                return { reply: intentConfirmation(intent), conversationId };
            }
        }

        const uploads = this.fileUploadService.saveFileUploads(files, conversationId);
        const history = await this.chatMemoryService.getRecentMessages(conversationId, HISTORY_LIMIT);

        let replyWithMemory: string;
        try {
            replyWithMemory = await this.orchestratorService.respond(query, uploads.map(u => u.localPath), history);
        } catch (error) {
            this.logger.error(`Processing error in ${conversationId}: ${errorMessage(error)}`);
            throw new HttpException(
                { message: `Processing error: ${errorMessage(error)}`, code: 'PROCESSING_ERROR' },
                HttpStatus.INTERNAL_SERVER_ERROR,
            );
        }

        // the stored turn keeps the memory wrapper, the caller only sees the answer
        await this.chatMemoryService.appendMessage(conversationId, 'user', query);
        await this.chatMemoryService.appendMessage(conversationId, 'assistant', replyWithMemory);
        await this.chatMemoryService.setTitleIfEmpty(conversationId, query);

        return { reply: stripDocMemory(replyWithMemory), conversationId };
    }

    async createConversation(name?: string): Promise<CreateConversationResponse> {
        const conversation = await this.chatMemoryService.createConversation(name ?? null);
        return { conversationId: conversation.id, welcome: WELCOME_MESSAGE };
    }

    getAllConversations(): Promise<ConversationSummary[]> {
        return this.chatMemoryService.listConversations();
    }

    async getConversationMessages(conversationId: string, limit = MESSAGES_LIMIT): Promise<StoredMessage[]> {
        await this.assertExists(conversationId);
        const messages = await this.chatMemoryService.getRecentMessages(conversationId, limit);
        return messages.map(m => (m.role === 'assistant' ? { ...m, content: stripDocMemory(m.content) } : m));
    }

    async clearConversation(conversationId: string): Promise<{ conversationId: string; cleared: number }> {
        await this.assertExists(conversationId);
        const cleared = await this.chatMemoryService.clearMessages(conversationId);
        return { conversationId, cleared };
    }

    async deleteConversation(conversationId: string): Promise<{ conversationId: string; deleted: boolean }> {
        await this.assertExists(conversationId);
        await this.chatMemoryService.deleteConversation(conversationId);
        this.fileUploadService.removeConversationFiles(conversationId);
        return { conversationId, deleted: true };
    }

    async deleteAllConversations(): Promise<{ deleted: number }> {
        const ids = await this.chatMemoryService.deleteAllConversations();
        for (const id of ids) {
            this.fileUploadService.removeConversationFiles(id);
        }
        return { deleted: ids.length };
    }

    private async assertExists(conversationId: string): Promise<void> {
        if (!(await this.chatMemoryService.exists(conversationId))) {
            throw new NotFoundException(`Conversation ${conversationId} not found`);
        }
    }
}
