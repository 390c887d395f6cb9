import { TimeoutError, withTimeout } from './timeout';

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it('should reject with a TimeoutError when the timer wins', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(withTimeout(never, 5, 'health check')).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never, 5, 'health check')).rejects.toThrow(
      'health check timed out after 5ms',
    );
  });
});
