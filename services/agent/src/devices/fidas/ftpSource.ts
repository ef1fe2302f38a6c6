// services/agent/src/devices/fidas/ftpSource.ts

import { Writable } from 'node:stream'
import { Client, type AccessOptions, type FileInfo } from 'basic-ftp'

import { ReadError, errorMessage } from '../../core/pipeline/errors.js'
import type {
    FidasEventSink,
    FidasFileEntry,
    FidasFileSource,
    FidasFtpConfig,
    FidasSession,
} from './types.js'

/** The part of basic-ftp's Client the source uses. */
export interface FtpClient {
    access(options: AccessOptions): Promise<unknown>
    cd(path: string): Promise<unknown>
    list(): Promise<FileInfo[]>
    downloadTo(destination: Writable, fromRemotePath: string): Promise<unknown>
    close(): void
}

export type FtpClientFactory = (timeoutMs: number) => FtpClient

export interface FtpFileSourceDeps {
    events?: FidasEventSink
    createClient?: FtpClientFactory
}

/**
 * Plain-FTP export source (the instrument does not offer FTPS).
 *
 * Every session opens a fresh connection and closes it afterwards. Aborting
 * the signal closes the socket, which fails whatever transfer is running.
 */
export class FtpFileSource implements FidasFileSource {
    private readonly config: FidasFtpConfig
    private readonly events: FidasEventSink | null
    private readonly createClient: FtpClientFactory

    constructor(config: FidasFtpConfig, deps: FtpFileSourceDeps = {}) {
        this.config = config
        this.events = deps.events ?? null
        this.createClient = deps.createClient ?? ((timeoutMs) => new Client(timeoutMs))
    }

    async session<T>(fn: (session: FidasSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
        const host = this.config.host
        if (!host) throw new ReadError('TransientUnavailable', 'FTP_HOST is not configured', { reason: 'ftp-unconfigured' })
        if (signal?.aborted) throw new ReadError('TransientUnavailable', 'read cancelled', { reason: 'aborted' })

        const client = this.createClient(this.config.timeoutMs)
        const onAbort = (): void => client.close()
        signal?.addEventListener('abort', onAbort, { once: true })

        try {
            await ftpStep('login', () => client.access({
                host,
                port: this.config.port,
                user: this.config.username ?? undefined,
                password: this.config.password ?? undefined,
                secure: false,
            }))
            this.events?.publish({
                kind: 'ftp-connected',
                at: Date.now(),
                host,
                port: this.config.port,
                user: this.config.username ?? 'anonymous',
            })

            const dir = this.config.homeDir
            if (dir) {
                try {
                    await client.cd(dir)
                } catch (err) {
                    // chrooted accounts cannot cd; the exports are in the login directory then
                    this.events?.publish({ kind: 'ftp-home-dir-unavailable', at: Date.now(), dir, error: errorMessage(err) })
                }
            }

            return await fn({
                list: () => ftpStep('list', async () => (await client.list()).filter(f => f.isFile).map(toEntry)),
                download: (name) => ftpStep(`download ${name}`, () => downloadText(client, name)),
            })
        } finally {
            signal?.removeEventListener('abort', onAbort)
            client.close()
        }
    }
}

function toEntry(info: FileInfo): FidasFileEntry {
    const modifiedAt = info.modifiedAt && Number.isFinite(info.modifiedAt.getTime()) ? info.modifiedAt : null
    return { name: info.name, modifiedAt }
}

async function downloadText(client: FtpClient, name: string): Promise<string> {
    const chunks: Buffer[] = []
    const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk)
            callback()
        },
    })
    await client.downloadTo(sink, name)
    return Buffer.concat(chunks).toString('utf8')
}

async function ftpStep<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn()
    } catch (err) {
        if (err instanceof ReadError) throw err
        throw new ReadError('TransientUnavailable', `ftp ${what} failed: ${errorMessage(err)}`, { reason: 'ftp-unavailable', cause: err })
    }
}
