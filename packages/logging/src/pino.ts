import pino, { type Logger, type LoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ChannelLogger,
    type ClientLogBuffer,
    type ClientLogLevel,
    type CreateLoggerOptions,
    type LoggerBundle,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

type Extra = Record<string, unknown> | undefined

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const PRETTY = opts.destination
        ? false
        : opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } }
        },
        timestamp: pino.stdTimeFunctions.isoTime
    }

    let base: Logger
    if (opts.destination) {
        base = pino(options, opts.destination)
    } else if (PRETTY) {
        base = pino(options, pinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel'
        }))
    } else {
        base = pino(options)
    }

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        // The coloured prefix only makes sense for humans reading a TTY.
        const decorate = (msg: string): string => (PRETTY ? `${channelPrefix(ch)} ${msg}` : msg)
        const fields = (extra: Extra): Record<string, unknown> =>
            extra ? { channel: ch, ...extra } : { channel: ch }

        const write = (level: ClientLogLevel, msg: string, extra: Extra): void => {
            base[level](fields(extra), decorate(msg))
            fanout(ch, level, msg)
        }

        return {
            debug: (msg, extra) => write('debug', msg, extra),
            info: (msg, extra) => write('info', msg, extra),
            warn: (msg, extra) => write('warn', msg, extra),
            error: (msg, extra) => write('error', msg, extra),
            fatal: (msg, extra) => write('fatal', msg, extra),
        }
    }

    return { base, channel }
}
