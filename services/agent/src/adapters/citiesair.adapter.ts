// services/agent/src/adapters/citiesair.adapter.ts

import type { ChannelLogger } from '@fidas-agent/logging'

import type { CitiesAirEvent, CitiesAirEventSink } from '../sinks/citiesair/CitiesAirUploader.js'

export class CitiesAirLoggerEventSink implements CitiesAirEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: CitiesAirEvent): void {
        switch (evt.kind) {
            case 'batch-posted': {
                this.log.debug(`kind=${evt.kind} count=${evt.count} status=${evt.status} ms=${evt.durationMs}`)
                break
            }

            case 'batch-rejected': {
                this.log.warn(`kind=${evt.kind} count=${evt.count} status=${evt.status} body=${JSON.stringify(evt.bodyPreview)}`)
                break
            }

            case 'request-failed': {
                this.log.warn(`kind=${evt.kind} count=${evt.count} code=${evt.code ?? 'none'} error=${JSON.stringify(evt.error)}`)
                break
            }

            case 'dry-run': {
                this.log.info(`kind=${evt.kind} count=${evt.count} first=${evt.first} last=${evt.last}`)
                break
            }
        }
    }
}
