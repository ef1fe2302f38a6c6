// services/agent/src/core/lifecycle/LifecycleController.ts

import type { ChannelLogger } from '@fidas-agent/logging'

import { errorMessage } from '../pipeline/errors.js'

/** The part of the pump the controller drives. */
export interface Stoppable {
    requestStop(): void
    whenStopped(): Promise<void>
}

/** Runs once the pump has stopped (or the grace period ran out). */
export interface FlushStep {
    name: string
    run(): Promise<void> | void
}

export interface SignalSource {
    on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
    off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
}

export interface LifecycleDeps {
    pump: Stoppable
    log: ChannelLogger
    graceMs: number
    /** Executed in order; a failing step is logged and the rest still run. */
    flush?: FlushStep[]
    exit?: (code: number) => void
    signals?: SignalSource
}

/**
 * LifecycleController
 *
 * Turns SIGINT/SIGTERM, a programmatic request or the end of the pump loop
 * into one orderly shutdown:
 *
 *   requestStop -> wait (<= graceMs) -> flush steps -> exit(code)
 *
 * Exit code is 0 for a clean stop, 1 when the grace period elapsed, the pump
 * failed, or a flush step threw. Only the first request counts; later ones
 * are logged and get the same promise back.
 */
export class LifecycleController {
    private readonly pump: Stoppable
    private readonly log: ChannelLogger
    private readonly graceMs: number
    private readonly flush: FlushStep[]
    private readonly exit: (code: number) => void
    private readonly signals: SignalSource

    private shutdownPromise: Promise<number> | null = null

    constructor(deps: LifecycleDeps) {
        this.pump = deps.pump
        this.log = deps.log
        this.graceMs = deps.graceMs
        this.flush = deps.flush ?? []
        this.exit = deps.exit ?? ((code) => process.exit(code))
        this.signals = deps.signals ?? process
    }

    /** Installs handlers for the given signals; returns an uninstaller. */
    installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): () => void {
        const onSignal = (signal: NodeJS.Signals): void => {
            void this.shutdown(`signal=${signal}`)
        }
        for (const s of signals) this.signals.on(s, onSignal)
        return () => {
            for (const s of signals) this.signals.off(s, onSignal)
        }
    }

    /**
     * Watches the pump loop. A clean return (someone else stopped it) shuts
     * down with 0; a rejection is fatal and shuts down with 1.
     */
    supervise(run: Promise<void>): Promise<number> {
        return run.then(
            () => this.shutdown('pump-stopped'),
            (err: unknown) => {
                this.log.fatal(`kind=pump-fatal error=${JSON.stringify(errorMessage(err))}`)
                return this.shutdown('pump-fatal', 1)
            }
        )
    }

    shutdown(reason: string, exitCode = 0): Promise<number> {
        if (this.shutdownPromise) {
            if (reason !== 'pump-stopped') this.log.warn(`kind=shutdown-ignored reason=${reason} note=already-shutting-down`)
            return this.shutdownPromise
        }
        this.shutdownPromise = this.runShutdown(reason, exitCode)
        return this.shutdownPromise
    }

    /* ---------------------------------------------------------------------- */

    private async runShutdown(reason: string, exitCode: number): Promise<number> {
        this.log.info(`kind=shutdown-requested reason=${reason} graceMs=${this.graceMs}`)
        this.pump.requestStop()

        let code = exitCode
        const stoppedInTime = await this.waitForPump()
        if (!stoppedInTime) {
            this.log.error(`kind=shutdown-grace-elapsed graceMs=${this.graceMs} note=exiting-with-work-in-flight`)
            code = 1
        }

        for (const step of this.flush) {
            try {
                await step.run()
                this.log.debug(`kind=flush-step-done step=${step.name}`)
            } catch (err) {
                this.log.error(`kind=flush-step-failed step=${step.name} error=${JSON.stringify(errorMessage(err))}`)
                code = 1
            }
        }

        this.log.info(`kind=shutdown-complete reason=${reason} code=${code}`)
        this.exit(code)
        return code
    }

    private waitForPump(): Promise<boolean> {
        return new Promise<boolean>((resolve) => {
            const timer = setTimeout(() => resolve(false), Math.max(0, this.graceMs))
            this.pump.whenStopped().then(
                () => {
                    clearTimeout(timer)
                    resolve(true)
                },
                () => {
                    // a failing pump has stopped all the same
                    clearTimeout(timer)
                    resolve(true)
                }
            )
        })
    }
}
