/**
 * Error types raised by the save codec.
 *
 * Every failure carries a stable `code` and a structured `context`. Property decoding and
 * encoding attach a `path` (e.g. `Inventory.Items[2].Count`) and byte `offset` where known.
 */

export type SavErrorCode =
    | 'truncated_input'
    | 'corrupt_chunk'
    | 'unknown_property_type'
    | 'length_mismatch'
    | 'malformed_json'
    | 'invalid_format'
    | 'type_mismatch'
    | 'invalid_config';

export type ErrorContext = Readonly<Record<string, unknown>>;

export interface SerializedError {
    name: string;
    code: string;
    message: string;
    context: Record<string, unknown>;
    cause?: SerializedError;
}

export interface SavCodecErrorOptions<C extends SavErrorCode> {
    code: C;
    context?: ErrorContext;
    cause?: unknown;
}

export class SavCodecError<C extends SavErrorCode = SavErrorCode> extends Error {
    readonly code: C;
    private readonly details: Record<string, unknown>;

    constructor(message: string, options: SavCodecErrorOptions<C>) {
        super(message, { cause: options.cause });
        this.name = this.constructor.name;
        this.code = options.code;
        this.details = { ...options.context };

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    get context(): ErrorContext {
        return this.details;
    }

    /**
     * Adds context entries that are not already present. Outer frames call this while the
     * error unwinds, so the innermost value of a key wins.
     */
    annotate(extra: ErrorContext): this {
        for (const [key, value] of Object.entries(extra)) {
            if (value !== undefined && !(key in this.details)) this.details[key] = value;
        }
        return this;
    }

    toJSON(): SerializedError {
        return serializeError(this);
    }
}

/** Input ended before a complete value could be read. */
export class TruncatedInputError extends SavCodecError<'truncated_input'> {
    constructor(message: string, context?: ErrorContext) {
        super(message, { code: 'truncated_input', context });
    }
}

/** A compressed chunk (or the container around it) failed validation. */
export class CorruptChunkError extends SavCodecError<'corrupt_chunk'> {
    constructor(message: string, context?: ErrorContext, cause?: unknown) {
        super(message, { code: 'corrupt_chunk', context, cause });
    }
}

export class UnknownPropertyTypeError extends SavCodecError<'unknown_property_type'> {
    constructor(readonly propertyType: string, context?: ErrorContext) {
        super(`Unknown property type "${propertyType}"`, { code: 'unknown_property_type', context });
    }
}

/** A declared byte length disagrees with the bytes actually consumed. */
export class LengthMismatchError extends SavCodecError<'length_mismatch'> {
    constructor(message: string, readonly declared: number, readonly actual: number, context?: ErrorContext) {
        super(message, { code: 'length_mismatch', context: { ...context, declared, actual } });
    }
}

export class MalformedJsonError extends SavCodecError<'malformed_json'> {
    constructor(message: string, context?: ErrorContext, cause?: unknown) {
        super(message, { code: 'malformed_json', context, cause });
    }
}

export class InvalidFormatError extends SavCodecError<'invalid_format'> {
    constructor(message: string, context?: ErrorContext) {
        super(message, { code: 'invalid_format', context });
    }
}

/** A model value does not fit the wire type it is declared with. */
export class TypeMismatchError extends SavCodecError<'type_mismatch'> {
    constructor(message: string, context?: ErrorContext) {
        super(message, { code: 'type_mismatch', context });
    }
}

export class ConfigError extends SavCodecError<'invalid_config'> {
    constructor(message: string, context?: ErrorContext) {
        super(message, { code: 'invalid_config', context });
    }
}

/**
 * Serialize any thrown value to a consistent shape.
 */
export function serializeError(err: unknown): SerializedError {
    if (err instanceof SavCodecError) {
        return {
            name: err.name,
            code: err.code,
            message: err.message,
            context: { ...err.context },
            ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
        };
    }
    if (err instanceof Error) {
        return {
            name: err.name,
            code: 'unknown',
            message: err.message,
            context: {},
            ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
        };
    }
    return {
        name: 'NonErrorThrown',
        code: 'unknown',
        message: typeof err === 'string' ? err : 'Unknown error',
        context: { value: err },
    };
}

/** One-line rendering used by the CLI: `Name [code]: message (path=..., offset=...)`. */
export function formatError(err: unknown): string {
    const s = serializeError(err);
    const details = Object.entries(s.context)
        .filter(([, v]) => typeof v === 'string' || typeof v === 'number' || typeof v === 'bigint')
        .map(([k, v]) => `${k}=${String(v)}`);
    const suffix = details.length ? ` (${details.join(', ')})` : '';
    return `${s.name} [${s.code}]: ${s.message}${suffix}`;
}
