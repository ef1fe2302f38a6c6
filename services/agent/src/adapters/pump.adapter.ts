// services/agent/src/adapters/pump.adapter.ts

import type { ChannelLogger } from '@fidas-agent/logging'

import type { PumpEvent, PumpEventSink } from '../core/pump/types.js'

const q = (s: string): string => JSON.stringify(s)

/**
 * PumpLoggerEventSink
 *
 * Renders pump events as `kind=... key=value` lines on the pump channel.
 * Per-measurement events stay at debug so a healthy agent logs one line per
 * delivered batch.
 */
export class PumpLoggerEventSink implements PumpEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: PumpEvent): void {
        switch (evt.kind) {
            case 'phase-changed': {
                this.log.debug(`kind=${evt.kind} from=${evt.from} to=${evt.to}`)
                break
            }

            case 'read-skipped': {
                // an instrument with nothing new is the normal idle case
                if (evt.reason === 'no-new-data') {
                    this.log.info(`kind=${evt.kind} reason=${evt.reason}`)
                } else {
                    this.log.warn(`kind=${evt.kind} reason=${evt.reason} error=${q(evt.error)}`)
                }
                break
            }

            case 'read-protocol-error': {
                this.log.error(`kind=${evt.kind} error=${q(evt.error)}`)
                break
            }

            case 'appended': {
                this.log.debug(`kind=${evt.kind} seq=${evt.sequence} pending=${evt.pending}`)
                break
            }

            case 'store-full': {
                this.log.warn(`kind=${evt.kind} seq=${evt.sequence} pushedBack=${evt.pushedBack}`)
                break
            }

            case 'batch-acknowledged': {
                this.log.info(
                    `kind=${evt.kind} first=${evt.firstSequence} last=${evt.lastSequence} count=${evt.count} pending=${evt.pending}`
                )
                break
            }

            case 'receipt-not-prefix': {
                this.log.warn(
                    `kind=${evt.kind} expected=${evt.expected.join(',')} accepted=${evt.accepted.join(',')}`
                )
                break
            }

            case 'upload-failed': {
                const line =
                    `kind=${evt.kind} errorKind=${evt.errorKind} status=${evt.status ?? 'none'} ` +
                    `retryable=${evt.retryable} batch=${evt.batchSize} error=${q(evt.error)}`
                if (evt.retryable) this.log.warn(line)
                else this.log.error(line)
                break
            }

            case 'backoff-started': {
                this.log.info(`kind=${evt.kind} attempt=${evt.attempt} delayMs=${evt.delayMs}`)
                break
            }

            case 'dead-lettered': {
                this.log.error(
                    `kind=${evt.kind} first=${evt.firstSequence} last=${evt.lastSequence} count=${evt.count} reason=${q(evt.reason)}`
                )
                break
            }

            case 'stop-requested': {
                this.log.info(`kind=${evt.kind} phase=${evt.phase}`)
                break
            }

            case 'stopped': {
                this.log.info(`kind=${evt.kind}`)
                break
            }

            case 'fatal-error': {
                this.log.error(`kind=${evt.kind} error=${q(evt.error)}`)
                break
            }
        }
    }
}
