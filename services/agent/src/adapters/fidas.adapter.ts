// services/agent/src/adapters/fidas.adapter.ts

import type { ChannelLogger } from '@fidas-agent/logging'

import type { FidasEvent, FidasEventSink } from '../devices/fidas/types.js'

export class FidasLoggerEventSink implements FidasEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: FidasEvent): void {
        switch (evt.kind) {
            case 'ftp-connected': {
                this.log.debug(`kind=${evt.kind} host=${evt.host} port=${evt.port} user=${evt.user}`)
                break
            }

            case 'ftp-home-dir-unavailable': {
                this.log.warn(`kind=${evt.kind} dir=${evt.dir} error=${JSON.stringify(evt.error)} note=staying-in-login-dir`)
                break
            }

            case 'files-selected': {
                this.log.info(`kind=${evt.kind} since=${evt.since ?? 'start'} files=${evt.names.join(',')}`)
                break
            }

            case 'file-skipped': {
                this.log.warn(`kind=${evt.kind} file=${evt.name} reason=${evt.reason}`)
                break
            }

            case 'file-read': {
                this.log.info(`kind=${evt.kind} file=${evt.name} month=${evt.month ?? 'unknown'} rows=${evt.rows} new=${evt.newRows}`)
                break
            }

            case 'file-rejected': {
                this.log.error(`kind=${evt.kind} file=${evt.name} error=${JSON.stringify(evt.error)}`)
                break
            }

            case 'rows-buffered': {
                this.log.debug(`kind=${evt.kind} count=${evt.count} newest=${evt.newest}`)
                break
            }
        }
    }
}
