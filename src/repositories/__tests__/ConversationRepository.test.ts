// src/repositories/__tests__/ConversationRepository.test.ts
import { ConversationRepository } from '../ConversationRepository.js';
import { NotFoundError } from '../../utils/errors.js';
import { FakeDb } from '../../__tests__/helpers.js';

const CONVERSATION_ID = '7d5c2a8e-1f4b-4c1e-9a7d-3e2b1c0d9f8a';

const conversationRow = {
  conversation_id: CONVERSATION_ID,
  user_id: 'user-1',
  session_id: null,
  created_at: new Date('2024-03-01T10:00:00.000Z'),
  last_active_at: new Date('2024-03-01T10:05:00.000Z'),
};

function messageRow(id: string, content: string): Record<string, unknown> {
  return {
    message_id: id,
    conversation_id: CONVERSATION_ID,
    role: 'user',
    content,
    created_at: new Date('2024-03-01T10:00:00.000Z'),
  };
}

describe('ConversationRepository', () => {
  let db: FakeDb;
  let repository: ConversationRepository;

  beforeEach(() => {
    db = new FakeDb();
    repository = new ConversationRepository(db);
  });

  it('should resume the most recent conversation of the session', async () => {
    db.returns([conversationRow]);

    const conversation = await repository.openConversation('user-1');

    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].params).toEqual(['user-1', null]);
    expect(conversation).toEqual({
      conversation_id: CONVERSATION_ID,
      user_id: 'user-1',
      session_id: null,
      created_at: '2024-03-01T10:00:00.000Z',
      last_active_at: '2024-03-01T10:05:00.000Z',
    });
  });

  it('should create a conversation when the session has none', async () => {
    db.returns([]).returns([{ ...conversationRow, session_id: 'session-a' }]);

    const conversation = await repository.openConversation('user-1', 'session-a');

    expect(db.queries).toHaveLength(2);
    expect(db.queries[1].text).toContain('INSERT INTO conversations');
    expect(db.queries[1].text).toContain('ON CONFLICT DO NOTHING');
    expect(db.queries[1].params.slice(1)).toEqual(['user-1', 'session-a']);
    expect(conversation.session_id).toBe('session-a');
  });

  it('should return the conversation a concurrent turn created first', async () => {
    // Both turns missed the lookup; this one loses the insert.
    db.returns([]).returns([], 0).returns([{ ...conversationRow, session_id: 'session-a' }]);

    const conversation = await repository.openConversation('user-1', 'session-a');

    expect(db.queries).toHaveLength(3);
    expect(db.queries[2].text).toContain('SELECT * FROM conversations');
    expect(db.queries[2].params).toEqual(['user-1', 'session-a']);
    expect(conversation.conversation_id).toBe(CONVERSATION_ID);
  });

  it('should return the BIGSERIAL id of an appended message as a number', async () => {
    db.returns([{ message_id: '42' }]);

    expect(await repository.append('user-1', CONVERSATION_ID, 'assistant', 'Done!')).toBe(42);
    expect(db.queries[0].params).toEqual(['user-1', CONVERSATION_ID, 'assistant', 'Done!']);
  });

  it("should refuse to append to a conversation the user doesn't own", async () => {
    db.returns([]);

    await expect(repository.append('user-2', CONVERSATION_ID, 'user', 'hi')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should read the newest messages and return them oldest first', async () => {
    db.returns([messageRow('3', 'third'), messageRow('2', 'second')]);

    const messages = await repository.readRecent('user-1', CONVERSATION_ID, { maxMessages: 2 });

    expect(db.queries[0].params).toEqual(['user-1', CONVERSATION_ID, 2]);
    expect(messages.map((m) => [m.message_id, m.content])).toEqual([
      [2, 'second'],
      [3, 'third'],
    ]);
  });

  it('should not limit the query when only a token budget is given', async () => {
    db.returns([messageRow('2', 'bbbbbbbb'), messageRow('1', 'aaaa')]);

    const messages = await repository.readRecent('user-1', CONVERSATION_ID, { maxTokens: 2 });

    expect(db.queries[0].params[2]).toBeNull();
    expect(messages.map((m) => m.content)).toEqual(['bbbbbbbb']);
  });
});
