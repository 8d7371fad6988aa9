import type { EndUser } from '@botsmith/shared';
import type { ButtonPressEvent, InboundEvent, StartEvent, TransportFactory, WorkerHandlers, WorkerTransport } from '../types';
import { FakeGateway } from './fake-gateway';

/**
 * Транспорт без сети: события подаются через emit(), падение цикла через crash().
 */
export class FakeTransport implements WorkerTransport {
  readonly gateway: FakeGateway;
  readonly stopCalls: string[] = [];
  /** Если true, stop() не завершает run(): имитация зависшего polling */
  ignoreStop = false;
  private handlers: WorkerHandlers | null = null;
  private settle: { resolve: () => void; reject: (error: unknown) => void } | null = null;

  constructor(gateway: FakeGateway = new FakeGateway()) {
    this.gateway = gateway;
  }

  get running(): boolean {
    return this.settle !== null;
  }

  run(handlers: WorkerHandlers): Promise<void> {
    this.handlers = handlers;
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  stop(reason = 'stop'): void {
    this.stopCalls.push(reason);
    if (!this.ignoreStop) {
      this.settle?.resolve();
      this.settle = null;
    }
  }

  crash(error: unknown): void {
    this.settle?.reject(error);
    this.settle = null;
  }

  async emit(event: InboundEvent): Promise<void> {
    if (!this.handlers) {
      throw new Error('Transport is not running');
    }
    await this.handlers.onEvent(event);
  }
}

export interface FakeTransportPool {
  factory: TransportFactory;
  /** Транспорты в порядке создания, по токену */
  created: Array<{ token: string; transport: FakeTransport }>;
  latest(token: string): FakeTransport | undefined;
}

export function createFakeTransportPool(configure?: (transport: FakeTransport, token: string) => void): FakeTransportPool {
  const created: FakeTransportPool['created'] = [];
  return {
    created,
    factory: (token) => {
      const transport = new FakeTransport();
      configure?.(transport, token);
      created.push({ token, transport });
      return transport;
    },
    latest: (token) => created.filter((entry) => entry.token === token).at(-1)?.transport,
  };
}

export const testUser: EndUser = { id: 42, firstName: 'Ann', username: 'ann' };

export function startEvent(user: EndUser = testUser, chatId = user.id): StartEvent {
  return { type: 'start', chatId, user };
}

export function buttonEvent(
  data: string,
  options: { user?: EndUser; messageId?: number | null; callbackId?: string } = {}
): ButtonPressEvent {
  const user = options.user ?? testUser;
  return {
    type: 'button',
    callbackId: options.callbackId ?? 'callback-1',
    chatId: user.id,
    messageId: options.messageId === undefined ? 500 : options.messageId,
    data,
    user,
  };
}
