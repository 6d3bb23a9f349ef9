import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '@accounts/observability';
import { AuthEventEmitter, type AuthEvent } from './events.js';
import * as auth from './index.js';

async function flush() {
  await new Promise((resolve) => setTimeout(resolve, 0));
}

describe('AuthEventEmitter', () => {
  let emitter: AuthEventEmitter;

  beforeEach(() => {
    emitter = new AuthEventEmitter(createLogger({ level: 'silent' }));
  });

  it('attaches a timestamp to emitted events', async () => {
    const handler = vi.fn<(event: AuthEvent) => void>();
    emitter.on(handler);

    emitter.emit({ type: 'user.registered', userId: 'user_1' });
    await flush();

    expect(handler).toHaveBeenCalledTimes(1);
    const received = handler.mock.calls[0]?.[0];
    expect(received).toMatchObject({ type: 'user.registered', userId: 'user_1' });
    expect(received?.timestamp).toBeInstanceOf(Date);
  });

  it('does not call handlers synchronously', () => {
    const handler = vi.fn();
    emitter.on(handler);

    emitter.emit({ type: 'user.logout', userId: 'user_1' });

    expect(handler).not.toHaveBeenCalled();
  });

  it('keeps firing handlers when one throws', async () => {
    const calls: string[] = [];
    emitter.on(() => {
      calls.push('first');
      throw new Error('boom');
    });
    emitter.on(async () => {
      calls.push('second');
    });

    emitter.emit({ type: 'user.login.failed' });
    await flush();

    expect(calls).toEqual(['first', 'second']);
  });

  it('unsubscribes handlers', async () => {
    const handler = vi.fn();
    const off = emitter.on(handler);
    off();

    emitter.emit({ type: 'user.logout' });
    await flush();

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.handlerCount).toBe(0);
  });
});

describe('package exports', () => {
  it('exposes no shared emitter instance', () => {
    expect(auth).not.toHaveProperty('authEvents');
    expect(auth.AuthEventEmitter).toBe(AuthEventEmitter);
  });

  it('keeps handlers scoped to their own emitter', async () => {
    const logger = createLogger({ level: 'silent' });
    const first = new AuthEventEmitter(logger);
    const second = new AuthEventEmitter(logger);
    const handler = vi.fn();
    first.on(handler);

    second.emit({ type: 'user.registered', userId: 'user_1' });
    await flush();

    expect(handler).not.toHaveBeenCalled();
  });
});
