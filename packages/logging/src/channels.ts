import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.agent]:     { emoji: '🛰️', color: 'blue' },
    [LogChannel.pump]:      { emoji: '🔁', color: 'cyan' },
    [LogChannel.store]:     { emoji: '💾', color: 'green' },
    // Instrument side
    [LogChannel.fidas]:     { emoji: '🌫️', color: 'yellow' },
    // Ingestion API side
    [LogChannel.citiesair]: { emoji: '☁️', color: 'magenta' },
    [LogChannel.lifecycle]: { emoji: '⏻', color: 'red' },
    [LogChannel.http]:      { emoji: '📝', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function channelPrefix(ch: LogChannel, colorize: boolean): string {
    const meta = CHANNELS[ch]
    return colorize
        ? `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
        : `${meta.emoji} [${ch}]:`
}
