import { describe, expect, it, vi } from 'vitest';
import { withTimeout } from '../../lib/utils/withTimeout';

describe('withTimeout', () => {
    it('rejects with the timeout error when work does not settle', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<never>(() => undefined), 50, () => new Error('too slow'));
        const assertion = expect(pending).rejects.toThrow('too slow');

        await vi.advanceTimersByTimeAsync(50);

        await assertion;
    });

    it('returns the result of work that settles in time', async () => {
        await expect(withTimeout(Promise.resolve(42), 50, () => new Error('too slow'))).resolves.toBe(42);
    });

    it('waits without limit when no timeout is given', async () => {
        await expect(withTimeout(Promise.resolve('done'), undefined, () => new Error('unused'))).resolves.toBe('done');
        await expect(withTimeout(Promise.resolve('done'), 0, () => new Error('unused'))).resolves.toBe('done');
    });
});
