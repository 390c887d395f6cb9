import { Test } from '@nestjs/testing';
import { assistantConfig } from '../config/assistant.config';
import { InMemorySessionStore } from '../sessions/in-memory-session.store';
import { SESSION_STORE } from '../sessions/session.store';
import { testConfig } from '../test-utils/config';
import { RequestStatusRegistry } from './request-status.registry';
import { SessionsController } from './sessions.controller';

const HOUR_MS = 60 * 60 * 1000;

describe('SessionsController', () => {
  let clock: number;
  let store: InMemorySessionStore;
  let registry: RequestStatusRegistry;
  let controller: SessionsController;

  beforeEach(async () => {
    clock = 1_700_000_000_000;
    store = new InMemorySessionStore(0, () => clock);
    registry = new RequestStatusRegistry({
      terminalStatusTtlMs: 60_000,
      staleProcessingMs: 60_000,
      sweepIntervalMs: 60_000,
    });

    const module = await Test.createTestingModule({
      controllers: [SessionsController],
      providers: [
        { provide: SESSION_STORE, useValue: store },
        { provide: RequestStatusRegistry, useValue: registry },
        { provide: assistantConfig.KEY, useValue: testConfig() },
      ],
    }).compile();
    controller = module.get(SessionsController);
  });

  it('should return the stored history', async () => {
    await store.update('s1', [
      { role: 'user', content: 'What is an FIR?' },
      { role: 'assistant', content: 'A First Information Report.' },
    ]);

    expect(await controller.history('s1')).toEqual({
      session_id: 's1',
      history: [
        { role: 'user', content: 'What is an FIR?' },
        { role: 'assistant', content: 'A First Information Report.' },
      ],
    });
  });

  it('should return an empty history for unknown sessions', async () => {
    expect(await controller.history('unknown')).toEqual({ session_id: 'unknown', history: [] });
  });

  it('should delete a session and its status entry', async () => {
    await store.update('s1', [{ role: 'user', content: 'hi' }]);
    registry.start('s1').complete('hello');

    expect(await controller.remove('s1')).toEqual({
      message: 'Session s1 cleared',
      session_id: 's1',
      existed: true,
    });
    expect(await store.get('s1')).toEqual([]);
    expect(registry.get('s1')).toBeNull();
  });

  it('should treat deleting an unknown session as a no-op', async () => {
    expect(await controller.remove('ghost')).toEqual({
      message: 'Session ghost not found',
      session_id: 'ghost',
      existed: false,
    });
  });

  it('should list sessions active in the last 24 hours, newest first', async () => {
    await store.update('old', [{ role: 'user', content: 'a' }]);
    clock += 2 * HOUR_MS;
    await store.update('recent', [
      { role: 'user', content: 'b' },
      { role: 'assistant', content: 'c' },
    ]);
    clock += 23 * HOUR_MS;
    await store.update('newest', [{ role: 'user', content: 'd' }]);

    expect(await controller.list()).toEqual({
      sessions: [
        { session_id: 'newest', message_count: 1, last_activity: 1_700_090_000 },
        { session_id: 'recent', message_count: 2, last_activity: 1_700_007_200 },
      ],
    });
  });
});
