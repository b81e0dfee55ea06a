import { describe, it, expect, vi } from 'vitest';
import { depsEqual, memoize } from '../memo';

describe('depsEqual', () => {
    it('compares primitives by value and objects by identity', () => {
        const shared = { a: 1 };
        expect(depsEqual([1, 'x', null], [1, 'x', null])).toBe(true);
        expect(depsEqual([NaN], [NaN])).toBe(true);
        expect(depsEqual([shared], [shared])).toBe(true);
        expect(depsEqual([{ a: 1 }], [{ a: 1 }])).toBe(false);
    });

    it('compares arrays element-wise and dates by time', () => {
        expect(depsEqual([['a', 'b']], [['a', 'b']])).toBe(true);
        expect(depsEqual([['a', 'b']], [['b', 'a']])).toBe(false);
        expect(depsEqual([new Date(1000)], [new Date(1000)])).toBe(true);
        expect(depsEqual([new Date(1000)], [new Date(2000)])).toBe(false);
    });

    it('treats a different dependency count as a change', () => {
        expect(depsEqual([1], [1, 2])).toBe(false);
    });
});

describe('memoize', () => {
    it('computes lazily and only once per dependency set', () => {
        const compute = vi.fn((a: number, b: readonly string[]) => `${a}:${b.join(',')}`);
        const memo = memoize(compute);

        expect(compute).not.toHaveBeenCalled();
        expect(memo.get(1, ['x'])).toBe('1:x');
        expect(memo.get(1, ['x'])).toBe('1:x');
        expect(compute).toHaveBeenCalledTimes(1);
        expect(memo.computations).toBe(1);
    });

    it('recomputes when a dependency changes', () => {
        const memo = memoize((a: number) => ({ doubled: a * 2 }));

        const first = memo.get(2);
        const second = memo.get(3);
        const third = memo.get(3);

        expect(first).toEqual({ doubled: 4 });
        expect(second).toEqual({ doubled: 6 });
        expect(third).toBe(second);
        expect(memo.computations).toBe(2);
    });

    it('remembers only the last dependency set', () => {
        const memo = memoize((a: number) => a + 1);
        memo.get(1);
        memo.get(2);
        memo.get(1);
        expect(memo.computations).toBe(3);
    });

    it('recomputes after invalidate', () => {
        const memo = memoize((a: number) => a);
        memo.get(1);
        memo.invalidate();
        memo.get(1);
        expect(memo.computations).toBe(2);
    });

    it('compares a projected key when one is given', () => {
        const memo = memoize((request: { url: string; attempt: number }) => request.url, {
            key: (request) => [request.url]
        });

        memo.get({ url: '/a', attempt: 1 });
        memo.get({ url: '/a', attempt: 2 });
        memo.get({ url: '/b', attempt: 3 });

        expect(memo.computations).toBe(2);
    });

    it('shares one promise for async computations', async () => {
        const compute = vi.fn(async (id: string) => id.toUpperCase());
        const memo = memoize(compute);

        const a = memo.get('rfbrc');
        const b = memo.get('rfbrc');

        expect(a).toBe(b);
        await expect(a).resolves.toBe('RFBRC');
        expect(compute).toHaveBeenCalledTimes(1);
    });
});
