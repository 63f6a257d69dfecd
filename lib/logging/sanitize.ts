const SENSITIVE_KEYS = new Set([
    'authorization',
    'apikey',
    'api_key',
    'secret',
    'password',
    'token',
    'access_token',
    'refresh_token',
    'private_key',
    'privatekey',
    'signature',
    'service_role_key',
    'cookie',
]);
const MAX_STRING_LENGTH = 500;
const MAX_ARRAY_ITEMS = 10;
const MAX_OBJECT_KEYS = 20;
const MAX_DEPTH = 4;

/** Make a log payload JSON-safe: bounded size, secrets redacted, cycles cut. */
export function sanitizeForLogging(value: unknown): unknown {
    return sanitizeValue(value, new WeakSet(), 0);
}

function sanitizeValue(
    value: unknown,
    seen: WeakSet<object>,
    depth: number,
    keyName?: string,
): unknown {
    if (value === undefined || value === null) {
        return null;
    }
    if (keyName && SENSITIVE_KEYS.has(keyName.toLowerCase())) {
        return '[REDACTED]';
    }
    if (typeof value === 'string') {
        return truncateString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'bigint') {
        return value.toString();
    }
    if (value instanceof Date) {
        return value.toISOString();
    }

    if (Array.isArray(value)) {
        if (depth >= MAX_DEPTH) {
            return `[Array with ${value.length} items]`;
        }
        if (seen.has(value)) {
            return '[Circular]';
        }
        seen.add(value);
        const limited: unknown[] = value
            .slice(0, MAX_ARRAY_ITEMS)
            .map((item: unknown) => sanitizeValue(item, seen, depth + 1));
        if (value.length > MAX_ARRAY_ITEMS) {
            limited.push(`... (${value.length - MAX_ARRAY_ITEMS} more items)`);
        }
        return limited;
    }

    if (isRecord(value)) {
        if (depth >= MAX_DEPTH) {
            return '[Object truncated]';
        }
        if (seen.has(value)) {
            return '[Circular]';
        }
        seen.add(value);
        const keys = Object.keys(value).sort();
        const record: Record<string, unknown> = {};
        for (const key of keys.slice(0, MAX_OBJECT_KEYS)) {
            record[key] = sanitizeValue(value[key], seen, depth + 1, key);
        }
        if (keys.length > MAX_OBJECT_KEYS) {
            record.__truncated_keys = keys.length - MAX_OBJECT_KEYS;
        }
        return record;
    }

    return String(value);
}

function truncateString(value: string): string {
    if (value.length <= MAX_STRING_LENGTH) return value;
    return value.slice(0, MAX_STRING_LENGTH) + '...';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
