import { createLogger, DuplicateSceneError } from '@botsmith/shared';
import { describe, expect, it, vi } from 'vitest';
import type { ConstructorContext } from '../context';
import { CALLBACKS } from '../keyboards';
import { guarded, ID_ACTIONS, idAction } from '../setup';

const logger = createLogger('setup-test', { level: 'silent' });
const BOT_ID = '0b0b0b0b-0000-4000-8000-000000000001';

function createMockContext(callback: boolean) {
  return {
    from: { id: 123 },
    callbackQuery: callback ? { id: 'callback-1' } : undefined,
    reply: vi.fn().mockResolvedValue({}),
    answerCbQuery: vi.fn().mockResolvedValue(true),
  };
}

describe('guarded', () => {
  it('shows the user message of a constructor error as an alert', async () => {
    const ctx = createMockContext(true);
    const handler = guarded(
      'test',
      async () => {
        throw new DuplicateSceneError(BOT_ID, 'menu');
      },
      logger
    );

    await handler(ctx as unknown as ConstructorContext);

    expect(ctx.answerCbQuery).toHaveBeenCalledWith("❌ Сцена 'menu' уже существует.", { show_alert: true });
    expect(ctx.reply).not.toHaveBeenCalled();
  });

  it('replies with a generic notice to unexpected errors', async () => {
    const ctx = createMockContext(false);
    const handler = guarded(
      'test',
      async () => {
        throw new Error('connection reset');
      },
      logger
    );

    await handler(ctx as unknown as ConstructorContext);

    expect(ctx.reply).toHaveBeenCalledWith('❌ Произошла ошибка. Попробуйте позже.');
  });

  it('does not throw when the error notice cannot be delivered', async () => {
    const ctx = createMockContext(false);
    ctx.reply.mockRejectedValue(new Error('bot was blocked by the user'));
    const handler = guarded(
      'test',
      async () => {
        throw new Error('boom');
      },
      logger
    );

    await expect(handler(ctx as unknown as ConstructorContext)).resolves.toBeUndefined();
  });
});

describe('ID_ACTIONS', () => {
  it('routes every id callback built by the keyboards to exactly one handler', () => {
    const callbacks = [
      CALLBACKS.selectBot(BOT_ID),
      CALLBACKS.editScenes(BOT_ID),
      CALLBACKS.editScene(BOT_ID),
      CALLBACKS.deleteBot(BOT_ID),
      CALLBACKS.confirmDeleteBot(BOT_ID),
      CALLBACKS.setStartScene(BOT_ID),
    ];

    for (const data of callbacks) {
      const matching = ID_ACTIONS.filter(([prefix]) => idAction(prefix).test(data));
      expect(matching.map(([prefix]) => prefix)).toHaveLength(1);
    }
  });
});
