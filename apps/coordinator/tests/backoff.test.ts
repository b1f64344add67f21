import { calculateBackOff } from '../src/utils/backoff';

describe('calculateBackOff', () => {
    it('waits about the base delay on the first attempt', () => {
        const delay = calculateBackOff(1, 100);
        expect(delay).toBeGreaterThanOrEqual(90);
        expect(delay).toBeLessThanOrEqual(110);
    });

    it('grows by the multiplier', () => {
        expect(calculateBackOff(3, 100, { jitter: 0 })).toBe(400);
        expect(calculateBackOff(3, 100, { multiplier: 4, jitter: 0 })).toBe(1600);
    });

    it('caps at maxMs', () => {
        expect(calculateBackOff(10, 100, { maxMs: 500, jitter: 0 })).toBe(500);
    });

    it('treats attempt 0 like attempt 1', () => {
        expect(calculateBackOff(0, 100, { jitter: 0 })).toBe(100);
    });
});
