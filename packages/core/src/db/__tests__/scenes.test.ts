import {
  DuplicateSceneError,
  InvalidIdentifierError,
  MessageNotFoundError,
  SceneNotFoundError,
} from '@botsmith/shared';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { mockPgClient, paramsOf, queryResult, sqlOf } from '../../test-utils/pg-client-mock';
import { getPostgresClient } from '../postgres';
import {
  appendButton,
  appendMessage,
  createScene,
  deleteButton,
  deleteMessage,
  deleteScene,
  getButtonForBot,
  listButtons,
  listMessages,
  loadSceneContent,
} from '../scenes';

vi.mock('../postgres', () => ({
  getPostgresClient: vi.fn(),
}));

const BOT_ID = '0b0b0b0b-0000-4000-8000-000000000001';
const SCENE_ID = '5c5c5c5c-0000-4000-8000-000000000002';
const MESSAGE_ID = '3e3e3e3e-0000-4000-8000-000000000003';
const BUTTON_ID = 'b7b7b7b7-0000-4000-8000-000000000004';
const CREATED_AT = new Date('2024-01-01T00:00:00Z');

beforeEach(() => {
  vi.clearAllMocks();
});

describe('createScene', () => {
  it('rejects an invalid identifier before touching the database', async () => {
    await expect(createScene(BOT_ID, 'main menu')).rejects.toBeInstanceOf(InvalidIdentifierError);
    expect(getPostgresClient).not.toHaveBeenCalled();
  });

  it('inserts the scene with a default name', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(
      queryResult([{ id: SCENE_ID, bot_id: BOT_ID, slug: 'shop', name: 'Сцена shop', created_at: CREATED_AT }])
    );

    const scene = await createScene(BOT_ID, ' shop ');

    expect(scene).toEqual({ id: SCENE_ID, botId: BOT_ID, slug: 'shop', name: 'Сцена shop', createdAt: CREATED_AT });
    expect(paramsOf(client, 0)).toEqual([BOT_ID, 'shop', 'Сцена shop']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('maps a unique violation to DuplicateSceneError', async () => {
    const client = mockPgClient();
    client.query.mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));

    const error = await createScene(BOT_ID, 'shop', 'Магазин').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DuplicateSceneError);
    expect(error).toMatchObject({ botId: BOT_ID, sceneId: 'shop', code: 'DUPLICATE_SCENE' });
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rethrows other database errors', async () => {
    const client = mockPgClient();
    client.query.mockRejectedValueOnce(new Error('connection reset'));

    await expect(createScene(BOT_ID, 'shop')).rejects.toThrow('connection reset');
  });
});

describe('appendMessage', () => {
  it('locks the scene, counts messages and inserts at count + 1 in one transaction', async () => {
    const client = mockPgClient();
    client.query
      .mockResolvedValueOnce(queryResult([]))
      .mockResolvedValueOnce(queryResult([{ id: SCENE_ID }]))
      .mockResolvedValueOnce(queryResult([{ count: '2' }]))
      .mockResolvedValueOnce(queryResult([{ id: MESSAGE_ID }]))
      .mockResolvedValueOnce(queryResult([]));

    const id = await appendMessage(SCENE_ID, 'Hello');

    expect(id).toBe(MESSAGE_ID);
    expect(sqlOf(client, 0)).toBe('BEGIN');
    expect(sqlOf(client, 1)).toBe('SELECT id FROM bot_scenes WHERE id = $1 FOR UPDATE');
    expect(sqlOf(client, 2)).toBe('SELECT COUNT(*)::text AS count FROM scene_messages WHERE scene_id = $1');
    expect(paramsOf(client, 3)).toEqual([SCENE_ID, 3, 'Hello', 'text', null]);
    expect(sqlOf(client, 4)).toBe('COMMIT');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('keeps the media reference for photos', async () => {
    const client = mockPgClient();
    client.query
      .mockResolvedValueOnce(queryResult([]))
      .mockResolvedValueOnce(queryResult([{ id: SCENE_ID }]))
      .mockResolvedValueOnce(queryResult([{ count: '0' }]))
      .mockResolvedValueOnce(queryResult([{ id: MESSAGE_ID }]));

    await appendMessage(SCENE_ID, 'Caption', 'photo', 'photo-file');

    expect(paramsOf(client, 3)).toEqual([SCENE_ID, 1, 'Caption', 'photo', 'photo-file']);
  });

  it('rolls back when the scene does not exist', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(queryResult([])).mockResolvedValueOnce(queryResult([]));

    await expect(appendMessage(SCENE_ID, 'Hello')).rejects.toBeInstanceOf(SceneNotFoundError);

    expect(client.query.mock.calls.map((_, index) => sqlOf(client, index))).toEqual([
      'BEGIN',
      'SELECT id FROM bot_scenes WHERE id = $1 FOR UPDATE',
      'ROLLBACK',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back when the insert fails', async () => {
    const client = mockPgClient();
    client.query
      .mockResolvedValueOnce(queryResult([]))
      .mockResolvedValueOnce(queryResult([{ id: SCENE_ID }]))
      .mockResolvedValueOnce(queryResult([{ count: '1' }]))
      .mockRejectedValueOnce(new Error('check constraint violated'));

    await expect(appendMessage(SCENE_ID, 'Hello')).rejects.toThrow('check constraint violated');

    expect(sqlOf(client, 4)).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});

describe('appendButton', () => {
  it('locks the message and appends the button at count + 1', async () => {
    const client = mockPgClient();
    client.query
      .mockResolvedValueOnce(queryResult([]))
      .mockResolvedValueOnce(queryResult([{ id: MESSAGE_ID }]))
      .mockResolvedValueOnce(queryResult([{ count: '0' }]))
      .mockResolvedValueOnce(queryResult([{ id: BUTTON_ID }]));

    const id = await appendButton(MESSAGE_ID, 'Дальше', 'goto:next');

    expect(id).toBe(BUTTON_ID);
    expect(sqlOf(client, 1)).toBe('SELECT id FROM scene_messages WHERE id = $1 FOR UPDATE');
    expect(paramsOf(client, 3)).toEqual([MESSAGE_ID, 1, 'Дальше', 'goto:next']);
    expect(sqlOf(client, 4)).toBe('COMMIT');
  });

  it('rolls back with a coded error when the message is gone', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(queryResult([])).mockResolvedValueOnce(queryResult([]));

    const failure = appendButton(MESSAGE_ID, 'Дальше', 'goto:next');

    await expect(failure).rejects.toBeInstanceOf(MessageNotFoundError);
    await expect(failure).rejects.toMatchObject({ code: 'MESSAGE_NOT_FOUND', messageId: MESSAGE_ID });
    expect(client.query.mock.calls.map((_, index) => sqlOf(client, index))).toEqual([
      'BEGIN',
      'SELECT id FROM scene_messages WHERE id = $1 FOR UPDATE',
      'ROLLBACK',
    ]);
  });
});

describe('deletes', () => {
  it('reports whether a message was removed and never throws for a missing id', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(queryResult([], 1)).mockResolvedValueOnce(queryResult([], 0));

    await expect(deleteMessage(MESSAGE_ID)).resolves.toBe(true);
    await expect(deleteMessage(MESSAGE_ID)).resolves.toBe(false);
  });

  it('deletes a scene with one statement and leaves messages and buttons to the cascade', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(queryResult([], 1));

    await expect(deleteScene(SCENE_ID)).resolves.toBe(true);

    expect(client.query).toHaveBeenCalledTimes(1);
    expect(sqlOf(client, 0)).toBe('DELETE FROM bot_scenes WHERE id = $1');
    expect(paramsOf(client, 0)).toEqual([SCENE_ID]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('reports a scene that is already gone', async () => {
    const client = mockPgClient();
    client.query.mockResolvedValueOnce(queryResult([], 0));

    await expect(deleteScene(SCENE_ID)).resolves.toBe(false);
    await expect(deleteScene('start')).resolves.toBe(false);
    expect(client.query).toHaveBeenCalledTimes(1);
  });

  it('treats a malformed id as missing', async () => {
    await expect(deleteButton('not-a-uuid')).resolves.toBe(false);
    expect(getPostgresClient).not.toHaveBeenCalled();
  });

  it('returns an empty button list for a deleted message', async () => {
    mockPgClient();

    await expect(listButtons(MESSAGE_ID)).resolves.toEqual([]);
  });
});

describe('reads', () => {
  it('orders messages by position, then creation time', async () => {
    const client = mockPgClient();

    await listMessages(SCENE_ID);

    expect(sqlOf(client, 0)).toBe(
      'SELECT id, scene_id, position, body, kind, media_ref, created_at FROM scene_messages WHERE scene_id = $1 ORDER BY position, created_at'
    );
  });

  it('scopes button lookup to the bot', async () => {
    const client = mockPgClient();

    await expect(getButtonForBot(BOT_ID, BUTTON_ID)).resolves.toBeNull();
    await expect(getButtonForBot(BOT_ID, 'legacy')).resolves.toBeNull();

    expect(client.query).toHaveBeenCalledTimes(1);
    expect(sqlOf(client, 0)).toContain('WHERE b.id = $1 AND s.bot_id = $2');
    expect(paramsOf(client, 0)).toEqual([BUTTON_ID, BOT_ID]);
  });

  it('loads scene content with buttons grouped by message', async () => {
    const client = mockPgClient();
    const second = '3e3e3e3e-0000-4000-8000-000000000005';
    client.query
      .mockResolvedValueOnce(
        queryResult([
          { id: MESSAGE_ID, scene_id: SCENE_ID, position: 1, body: 'One', kind: 'text', media_ref: null, created_at: CREATED_AT },
          { id: second, scene_id: SCENE_ID, position: 2, body: 'Two', kind: 'text', media_ref: null, created_at: CREATED_AT },
        ])
      )
      .mockResolvedValueOnce(
        queryResult([
          { id: BUTTON_ID, message_id: MESSAGE_ID, position: 1, label: 'Go', action: 'goto:b', created_at: CREATED_AT },
        ])
      );

    const content = await loadSceneContent(SCENE_ID);

    expect(paramsOf(client, 1)).toEqual([[MESSAGE_ID, second]]);
    expect(content.map((message) => message.buttons.map((button) => button.label))).toEqual([['Go'], []]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('skips the button query for an empty scene', async () => {
    const client = mockPgClient();

    await expect(loadSceneContent(SCENE_ID)).resolves.toEqual([]);
    expect(client.query).toHaveBeenCalledTimes(1);
  });
});
