// services/bridge/src/core/errors.ts

export type LinkErrorCode =
    | 'PORT_NOT_FOUND'
    | 'CONNECT_FAILED'
    | 'NOT_CONNECTED'
    | 'INVALID_ARGUMENT'

/**
 * Base class for failures the link layer reports to its callers.
 * Transient read errors never surface as one of these; the reconnect loop owns them.
 */
export class LinkError extends Error {
    readonly code: LinkErrorCode
    readonly recoverable: boolean
    readonly context?: Record<string, unknown>

    constructor(
        code: LinkErrorCode,
        message: string,
        options: { cause?: unknown; context?: Record<string, unknown>; recoverable?: boolean } = {}
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause })
        this.name = 'LinkError'
        this.code = code
        this.context = options.context
        this.recoverable = options.recoverable ?? true
    }
}

export class ConnectError extends LinkError {
    constructor(
        message: string,
        options: { code?: LinkErrorCode; cause?: unknown; context?: Record<string, unknown> } = {}
    ) {
        const { code, ...rest } = options
        super(code ?? 'CONNECT_FAILED', message, rest)
        this.name = 'ConnectError'
    }

    static openFailed(path: string, cause: unknown): ConnectError {
        return new ConnectError(`Could not open ${path}: ${describeError(cause)}`, {
            cause,
            context: { path },
        })
    }
}

/** A ConnectError raised before any device path could be chosen. */
export class PortNotFoundError extends ConnectError {
    constructor(patterns: readonly string[]) {
        super(
            `No serial port specified and auto-detection found nothing. Looked for: ${patterns.join(', ')}`,
            { code: 'PORT_NOT_FOUND', context: { patterns: [...patterns] } }
        )
        this.name = 'PortNotFoundError'
    }
}

export class NotConnectedError extends LinkError {
    constructor() {
        super('NOT_CONNECTED', 'Serial port is not open.')
        this.name = 'NotConnectedError'
    }
}

/** Built for its message only; engine commands log it instead of throwing. */
export class InvalidArgumentError extends LinkError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('INVALID_ARGUMENT', message, { context })
        this.name = 'InvalidArgumentError'
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message
    return String(err)
}
