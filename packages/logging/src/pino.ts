import { pino, type DestinationStream, type Logger, type LoggerOptions, type LogFn } from 'pino'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

export type CreateLoggerOptions = {
    /** Overrides PRETTY_LOGS. */
    pretty?: boolean
    /** Overrides LOG_LEVEL. */
    level?: string
    /** Write JSON lines here instead of stdout (pretty is ignored). */
    destination?: DestinationStream
}

function isChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && v in CHANNELS
}

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const PRETTY = opts.destination
        ? false
        : opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    let base: Logger

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                // JSON output keeps the channel as a field; only pretty output gets the prefix
                if (!PRETTY) {
                    Reflect.apply(method, base, args)
                    return
                }

                let ch: LogChannel | undefined
                const first = args[0]
                if (typeof first === 'object' && first !== null && 'channel' in first && isChannel(first.channel)) {
                    ch = first.channel
                }

                if (ch) {
                    const prefix = channelPrefix(ch, true)
                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    if (opts.destination) {
        base = pino(options, opts.destination)
    } else if (PRETTY) {
        base = pino({
            ...options,
            transport: {
                target: 'pino-pretty',
                options: {
                    translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
                    colorize: true,
                    singleLine: false,
                    ignore: 'pid,hostname,service,channel'
                }
            }
        })
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

    const write = (ch: LogChannel, level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }
        base[level](obj, msg)
        fanout(ch, level, msg)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => write(ch, 'debug', msg, extra),
        info: (msg, extra) => write(ch, 'info', msg, extra),
        warn: (msg, extra) => write(ch, 'warn', msg, extra),
        error: (msg, extra) => write(ch, 'error', msg, extra),
        fatal: (msg, extra) => write(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}
