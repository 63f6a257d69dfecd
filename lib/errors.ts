import axios from 'axios';

// ──────────────────────────────────────────────────────────────────────
// Error taxonomy
// ──────────────────────────────────────────────────────────────────────

export type TradingErrorKind =
    | 'TRANSIENT_ORDER'
    | 'PERMANENT_ORDER'
    | 'PERSISTENCE'
    | 'CORRUPT_STATE'
    | 'RECONCILIATION_AMBIGUITY'
    | 'CONFIG';

export abstract class TradingError extends Error {
    abstract readonly kind: TradingErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Target market closed or rolled over between signal and order. Retrying later may succeed. */
export class TransientOrderError extends TradingError {
    readonly kind = 'TRANSIENT_ORDER' as const;

    constructor(message: string, readonly ticker?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Any other order rejection. Retrying is futile. */
export class PermanentOrderError extends TradingError {
    readonly kind = 'PERMANENT_ORDER' as const;

    constructor(message: string, readonly ticker?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** A durable write failed; the in-memory state was left untouched. */
export class PersistenceError extends TradingError {
    readonly kind = 'PERSISTENCE' as const;

    constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** A ledger file could not be deserialized. */
export class CorruptStateError extends TradingError {
    readonly kind = 'CORRUPT_STATE' as const;

    constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** A position vanished from the exchange with no settlement signal. */
export class ReconciliationAmbiguity extends TradingError {
    readonly kind = 'RECONCILIATION_AMBIGUITY' as const;

    constructor(message: string, readonly ticker: string) {
        super(message);
    }
}

export class ConfigError extends TradingError {
    readonly kind = 'CONFIG' as const;
}

export type OrderFailureKind = 'transient' | 'permanent';

/**
 * Transient only when the error says so explicitly; every other failure,
 * including network errors, is permanent for the purposes of retrying.
 */
export function classifyOrderError(err: unknown): OrderFailureKind {
    return err instanceof TransientOrderError ? 'transient' : 'permanent';
}

// ──────────────────────────────────────────────────────────────────────
// Log-safe error shape
// ──────────────────────────────────────────────────────────────────────

type JsonSafeError = {
    name: string;
    message: string;
    kind?: TradingErrorKind;
    stack?: string;
    code?: string;
    status?: number;
    upstream?: {
        status?: number;
        data?: unknown;
    };
    details?: unknown;
};

const DEV = process.env.NODE_ENV !== 'production';

export function sanitizeError(err: unknown): JsonSafeError {
    const safe: JsonSafeError = {
        name: 'UnknownError',
        message: 'Unknown error',
    };

    if (!err) return safe;

    if (err instanceof Error) {
        safe.name = err.name;
        safe.message = err.message;
        if (DEV) {
            safe.stack = err.stack;
        }
    }

    if (err instanceof TradingError) {
        safe.kind = err.kind;
        return safe;
    }

    if (axios.isAxiosError(err)) {
        safe.name = 'AxiosError';
        safe.message = err.message;
        safe.code = err.code;
        safe.status = err.response?.status;
        safe.upstream = {
            status: err.response?.status,
            data: tryJsonSafe(err.response?.data),
        };
        return safe;
    }

    if (typeof err === 'object' && !(err instanceof Error)) {
        safe.details = tryJsonSafe(err);
    } else if (typeof err !== 'object') {
        safe.message = String(err);
    }

    return safe;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function tryJsonSafe(value: unknown): unknown {
    try {
        JSON.stringify(value);
        return value;
    } catch {
        return String(value);
    }
}
