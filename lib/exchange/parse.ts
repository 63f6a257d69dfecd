// Narrowing helpers for untyped JSON from the exchange.

import { isRecord } from '@/lib/logging/sanitize';

export function readRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

export function readArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

export function readString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function readNumber(value: unknown): number | undefined {
    if (value === null || value === undefined || value === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
}
