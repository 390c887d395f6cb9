import { RequestStatusRegistry } from './request-status.registry';

describe('RequestStatusRegistry', () => {
  let clock: number;
  let registry: RequestStatusRegistry;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    registry = new RequestStatusRegistry(
      { terminalStatusTtlMs: 5 * 60_000, staleProcessingMs: 30 * 60_000, sweepIntervalMs: 60_000 },
      () => clock,
    );
  });

  it('should track a request from processing to completed', () => {
    const ticket = registry.start('s1');
    expect(registry.get('s1')).toEqual({ status: 'processing', timestamp: 1_700_000_000 });

    clock += 1500;
    expect(ticket.complete('Answer')).toBe(true);
    expect(registry.get('s1')).toEqual({
      status: 'completed',
      response: 'Answer',
      timestamp: 1_700_000_001.5,
    });
  });

  it('should record failures with an error and optional response', () => {
    const ticket = registry.start('s1');
    ticket.fail('Request processing failed', 'Sorry');

    expect(registry.get('s1')).toEqual({
      status: 'failed',
      error: 'Request processing failed',
      response: 'Sorry',
      timestamp: 1_700_000_000,
    });
  });

  it('should ignore a late result from a replaced request', () => {
    const first = registry.start('s1');
    const second = registry.start('s1');

    expect(first.complete('old answer')).toBe(false);
    expect(registry.get('s1')?.status).toBe('processing');

    expect(second.complete('new answer')).toBe(true);
    expect(registry.get('s1')?.response).toBe('new answer');
  });

  it('should return null for unknown sessions and after clear', () => {
    expect(registry.get('missing')).toBeNull();
    registry.start('s1');
    expect(registry.clear('s1')).toBe(true);
    expect(registry.clear('s1')).toBe(false);
    expect(registry.get('s1')).toBeNull();
  });

  it('should evict terminal statuses after the retention period', () => {
    registry.start('s1').complete('done');

    clock += 5 * 60_000 - 1;
    expect(registry.sweep()).toEqual([]);

    clock += 1;
    expect(registry.sweep()).toEqual(['s1']);
    expect(registry.get('s1')).toBeNull();
  });

  it('should abort and evict stale processing requests', () => {
    const ticket = registry.start('s1');

    clock += 30 * 60_000;
    expect(registry.sweep()).toEqual(['s1']);
    expect(ticket.signal.aborted).toBe(true);
    expect(ticket.complete('too late')).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('should sweep on an interval between init and destroy', () => {
    jest.useFakeTimers();
    try {
      const sweep = jest.spyOn(registry, 'sweep');
      registry.onModuleInit();
      jest.advanceTimersByTime(120_000);
      expect(sweep).toHaveBeenCalledTimes(2);

      registry.onModuleDestroy();
      jest.advanceTimersByTime(120_000);
      expect(sweep).toHaveBeenCalledTimes(2);
    } finally {
      jest.useRealTimers();
    }
  });
});
