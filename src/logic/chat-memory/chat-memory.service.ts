import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Conversation, Message } from '../../entities';
import { ConversationSummary, Role, StoredMessage, toRole } from './types';

const TITLE_MAX = 60;

@Injectable()
export class ChatMemoryService {

  private RECENT_LIMIT = 50;   // history window handed to the assistant

  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepository: Repository<Conversation>,
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
  ) { }

  /** Returns the conversation, creating it (with the given id, if any) when it does not exist. */
  async ensureConversation(conversationId?: string): Promise<Conversation> {
    if (conversationId) {
      const c = await this.conversationRepository.findOne({ where: { id: conversationId } });
      if (c) return c;
      return this.conversationRepository.save({ id: conversationId, title: null });
    }
    return this.createConversation();
  }

  createConversation(title: string | null = null): Promise<Conversation> {
    return this.conversationRepository.save({ title: title?.trim().slice(0, TITLE_MAX) || null });
  }

  async exists(conversationId: string): Promise<boolean> {
    const count = await this.conversationRepository.count({ where: { id: conversationId } });
    return count > 0;
  }

  async appendMessage(conversationId: string, role: Role, content: string): Promise<StoredMessage> {
    const m = await this.messageRepository.save({ conversationId, role, content });
    return this.toStored(m);
  }

  countMessages(conversationId: string): Promise<number> {
    return this.messageRepository.count({ where: { conversationId } });
  }

  /** Newest `limit` messages, returned oldest first. */
  async getRecentMessages(conversationId: string, limit = this.RECENT_LIMIT): Promise<StoredMessage[]> {
    const msgs = await this.messageRepository.find({
      where: { conversationId },
      order: { id: 'DESC' },
      take: limit,
    });
    return msgs.reverse().map(m => this.toStored(m));
  }

  /** The first question names the conversation; later ones leave the title alone. */
  async setTitleIfEmpty(conversationId: string, text: string): Promise<void> {
    const conversation = await this.conversationRepository.findOne({ where: { id: conversationId } });
    if (conversation && !conversation.title) {
      const title = text.trim().replace(/\s+/g, ' ').slice(0, TITLE_MAX);
      if (title) {
        await this.conversationRepository.update(conversationId, { title });
      }
    }
  }

  async listConversations(): Promise<ConversationSummary[]> {
    const conversations = await this.conversationRepository.find({ order: { createdAt: 'DESC' } });
    const summaries = await Promise.all(conversations.map(async c => {
      const [messageCount, last] = await Promise.all([
        this.messageRepository.count({ where: { conversationId: c.id } }),
        this.messageRepository.findOne({ where: { conversationId: c.id }, order: { id: 'DESC' } }),
      ]);
      return {
        id: c.id,
        title: c.title,
        createdAt: c.createdAt,
        messageCount,
        lastMessageAt: last?.createdAt ?? null,
      };
    }));
    const activity = (s: ConversationSummary) => (s.lastMessageAt ?? s.createdAt).getTime();
    return summaries.sort((a, b) => activity(b) - activity(a));
  }

  async clearMessages(conversationId: string): Promise<number> {
    const result = await this.messageRepository.delete({ conversationId });
    return result.affected ?? 0;
  }

  async deleteConversation(conversationId: string): Promise<void> {
    await this.messageRepository.delete({ conversationId });
    await this.conversationRepository.delete({ id: conversationId });
  }

  /** Deletes every conversation and returns the removed ids. */
  async deleteAllConversations(): Promise<string[]> {
    const conversations = await this.conversationRepository.find({ select: { id: true } });
    for (const c of conversations) {
      await this.deleteConversation(c.id);
    }
    return conversations.map(c => c.id);
  }

  private toStored(m: Message): StoredMessage {
    return {
      id: m.id,
      role: toRole(m.role),
      content: m.content,
      createdAt: m.createdAt,
    };
  }
}
