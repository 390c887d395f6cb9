import { SessionKeyValueClient } from '../sessions/redis-session.store';

function bound(value: number | string): number {
  return value === '+inf' ? Infinity : value === '-inf' ? -Infinity : Number(value);
}

/** In-process stand-in for the handful of Redis commands the session store uses. */
export class FakeRedis implements SessionKeyValueClient {
  readonly strings = new Map<string, string>();
  readonly expiries = new Map<string, number>();
  readonly sortedSets = new Map<string, Map<string, number>>();
  getCalls = 0;
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    this.getCalls += 1;
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.strings.set(key, value);
    return 'OK';
  }

  async pexpire(key: string, milliseconds: number): Promise<number> {
    if (!this.strings.has(key)) return 0;
    this.expiries.set(key, milliseconds);
    return 1;
  }

  async del(key: string): Promise<number> {
    this.expiries.delete(key);
    return this.strings.delete(key) ? 1 : 0;
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    const set = this.sortedSets.get(key) ?? new Map<string, number>();
    const added = set.has(member) ? 0 : 1;
    set.set(member, score);
    this.sortedSets.set(key, set);
    return added;
  }

  async zrem(key: string, member: string): Promise<number> {
    return this.sortedSets.get(key)?.delete(member) ? 1 : 0;
  }

  async zremrangebyscore(key: string, min: number | string, max: number | string): Promise<number> {
    const set = this.sortedSets.get(key);
    if (!set) return 0;
    const lo = bound(min);
    const hi = bound(max);
    let removed = 0;
    for (const [member, score] of [...set.entries()]) {
      if (score >= lo && score <= hi) {
        set.delete(member);
        removed += 1;
      }
    }
    return removed;
  }

  async zrevrangebyscore(key: string, max: number | string, min: number | string): Promise<string[]> {
    const hi = bound(max);
    const lo = bound(min);
    return [...(this.sortedSets.get(key) ?? new Map<string, number>()).entries()]
      .filter(([, score]) => score <= hi && score >= lo)
      .sort((a, b) => b[1] - a[1])
      .map(([member]) => member);
  }

  async quit(): Promise<'OK'> {
    this.quitCalled = true;
    return 'OK';
  }

  /** Simulates the idle TTL firing. */
  expire(key: string): void {
    this.strings.delete(key);
  }
}
