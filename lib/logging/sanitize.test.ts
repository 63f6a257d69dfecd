import { describe, expect, it } from 'vitest';
import { sanitizeForLogging } from './sanitize';

describe('sanitizeForLogging', () => {
    it('redacts secret keys at any depth', () => {
        expect(sanitizeForLogging({ api_key: 'test-secret', nested: { Authorization: 'Bearer x', ok: 1 } })).toEqual({
            api_key: '[REDACTED]',
            nested: { Authorization: '[REDACTED]', ok: 1 },
        });
    });

    it('bounds strings and arrays', () => {
        const long = 'x'.repeat(600);
        const items = Array.from({ length: 12 }, (_, i) => i);

        expect(sanitizeForLogging(long)).toBe('x'.repeat(500) + '...');
        expect(sanitizeForLogging(items)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, '... (2 more items)']);
    });

    it('cuts cycles and normalises odd values', () => {
        const node: Record<string, unknown> = { name: 'a', at: new Date('2026-01-01T00:00:00Z'), missing: undefined };
        node.self = node;

        expect(sanitizeForLogging(node)).toEqual({
            at: '2026-01-01T00:00:00.000Z',
            missing: null,
            name: 'a',
            self: '[Circular]',
        });
    });
});
