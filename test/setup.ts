/**
 * Vitest Global Test Setup
 *
 * Browser-like shims for jsdom:
 * - ResizeObserver, which recharts' ResponsiveContainer observes
 */

// Ensure fetch is available (Node 18+ has native fetch)
if (typeof globalThis.fetch === 'undefined') {
    throw new Error('fetch is not available. Ensure Node 18+ is used.');
}

if (typeof globalThis.ResizeObserver === 'undefined') {
    class MockResizeObserver implements ResizeObserver {
        constructor(public readonly callback: ResizeObserverCallback) {}

        observe(): void {}
        unobserve(): void {}
        disconnect(): void {}
    }

    globalThis.ResizeObserver = MockResizeObserver;
}
