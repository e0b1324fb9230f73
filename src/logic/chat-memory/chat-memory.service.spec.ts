import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { Conversation, Message } from '../../entities';

interface ConversationRow { id: string; title: string | null; createdAt: Date }
interface MessageRow { id: number; conversationId: string; role: string; content: string; createdAt: Date }

// Minimal in-memory stand-ins for the two TypeORM repositories.
function createStore() {
  const conversations: ConversationRow[] = [];
  const messages: MessageRow[] = [];
  let nextId = 1;
  let clock = Date.UTC(2024, 0, 1);
  const tick = () => new Date((clock += 1000));

  const byConversation = (where: { conversationId: string }) =>
    messages.filter(m => m.conversationId === where.conversationId);

  const conversationRepository = {
    findOne: jest.fn(async ({ where }: { where: { id: string } }) => conversations.find(c => c.id === where.id) ?? null),
    find: jest.fn(async () => [...conversations].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())),
    count: jest.fn(async ({ where }: { where: { id: string } }) => conversations.filter(c => c.id === where.id).length),
    save: jest.fn(async (entity: { id?: string; title: string | null }) => {
      const row = { id: entity.id ?? `conv-${conversations.length + 1}`, title: entity.title, createdAt: tick() };
      conversations.push(row);
      return row;
    }),
    update: jest.fn(async (id: string, patch: { title: string }) => {
      const row = conversations.find(c => c.id === id);
      if (row) row.title = patch.title;
    }),
    delete: jest.fn(async ({ id }: { id: string }) => {
      const i = conversations.findIndex(c => c.id === id);
      if (i >= 0) conversations.splice(i, 1);
      return { affected: i >= 0 ? 1 : 0, raw: [] };
    }),
  };

  const messageRepository = {
    save: jest.fn(async (entity: { conversationId: string; role: string; content: string }) => {
      const row = { ...entity, id: nextId++, createdAt: tick() };
      messages.push(row);
      return row;
    }),
    count: jest.fn(async ({ where }: { where: { conversationId: string } }) => byConversation(where).length),
    find: jest.fn(async ({ where, take }: { where: { conversationId: string }; take: number }) =>
      byConversation(where).sort((a, b) => b.id - a.id).slice(0, take)),
    findOne: jest.fn(async ({ where }: { where: { conversationId: string } }) =>
      byConversation(where).sort((a, b) => b.id - a.id)[0] ?? null),
    delete: jest.fn(async (where: { conversationId: string }) => {
      const doomed = byConversation(where);
      for (const m of doomed) messages.splice(messages.indexOf(m), 1);
      return { affected: doomed.length, raw: [] };
    }),
  };

  return { conversations, messages, conversationRepository, messageRepository };
}

describe('ChatMemoryService', () => {
  let service: ChatMemoryService;
  let store: ReturnType<typeof createStore>;

  beforeEach(async () => {
    store = createStore();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatMemoryService,
        { provide: getRepositoryToken(Conversation), useValue: store.conversationRepository },
        { provide: getRepositoryToken(Message), useValue: store.messageRepository },
      ],
    }).compile();

    service = module.get<ChatMemoryService>(ChatMemoryService);
  });

  it('creates a conversation with the requested id and reuses it afterwards', async () => {
    const created = await service.ensureConversation('abc');
    const again = await service.ensureConversation('abc');

    expect(created.id).toBe('abc');
    expect(again).toBe(created);
    expect(store.conversations).toHaveLength(1);
    await expect(service.exists('abc')).resolves.toBe(true);
    await expect(service.exists('zzz')).resolves.toBe(false);
  });

  it('returns the newest messages in chronological order', async () => {
    await service.ensureConversation('c1');
    for (const content of ['uno', 'dos', 'tres', 'cuatro']) {
      await service.appendMessage('c1', 'user', content);
    }
    await service.appendMessage('other', 'user', 'ajeno');

    const recent = await service.getRecentMessages('c1', 3);

    expect(recent.map(m => m.content)).toEqual(['dos', 'tres', 'cuatro']);
    expect(recent.map(m => m.id)).toEqual([2, 3, 4]);
  });

  it('normalises stored roles', async () => {
    await service.appendMessage('c1', 'system', 'intent:legal');
    store.messages.push({ id: 99, conversationId: 'c1', role: 'tool', content: 'x', createdAt: new Date(0) });

    const recent = await service.getRecentMessages('c1');

    expect(recent.map(m => m.role)).toEqual(['system', 'assistant']);
  });

  it('names the conversation after the first question only', async () => {
    await service.ensureConversation('c1');

    await service.setTitleIfEmpty('c1', '  ¿Puedo   rescindir el contrato?  ');
    await service.setTitleIfEmpty('c1', 'Otra pregunta');

    expect(store.conversations[0].title).toBe('¿Puedo rescindir el contrato?');
  });

  it('lists conversations by latest activity with message counts', async () => {
    await service.ensureConversation('old');
    await service.ensureConversation('new');
    await service.appendMessage('old', 'user', 'hola');
    await service.appendMessage('old', 'assistant', 'buenas');

    const list = await service.listConversations();

    expect(list.map(c => [c.id, c.messageCount])).toEqual([['old', 2], ['new', 0]]);
    expect(list[1].lastMessageAt).toBeNull();
  });

  it('clears messages but keeps the conversation', async () => {
    await service.ensureConversation('c1');
    await service.appendMessage('c1', 'user', 'hola');
    await service.appendMessage('c1', 'assistant', 'buenas');

    await expect(service.clearMessages('c1')).resolves.toBe(2);
    await expect(service.countMessages('c1')).resolves.toBe(0);
    await expect(service.exists('c1')).resolves.toBe(true);
  });

  it('deletes every conversation and reports their ids', async () => {
    await service.ensureConversation('a');
    await service.ensureConversation('b');
    await service.appendMessage('a', 'user', 'hola');

    const removed = await service.deleteAllConversations();

    expect(removed.sort()).toEqual(['a', 'b']);
    expect(store.conversations).toHaveLength(0);
    expect(store.messages).toHaveLength(0);
  });
});
