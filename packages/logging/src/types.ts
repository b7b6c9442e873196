// packages/logging/src/types.ts

export enum LogChannel {
    app = 'app',
    request = 'request',
    link = 'link',
    engine = 'engine',
    session = 'session',
    bus = 'bus',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export type ClientLogListener = (log: ClientLog) => void

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    getLatest: (n: number) => ClientLog[]
    subscribe: (listener: ClientLogListener) => () => void
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}

export interface CreateLoggerOptions {
    /** Defaults to PRETTY_LOGS (true). Ignored when `destination` is given. */
    pretty?: boolean
    /** Defaults to LOG_LEVEL (info). */
    level?: string
    /** Raw JSON sink; mostly useful for tests. */
    destination?: import('pino').DestinationStream
}
