import { GeneratedArtifact } from '../domain/entities/GeneratedArtifact';
import { TASK_KIND_LABELS, TaskHandle, TaskStatus, isFailureState } from '../domain/entities/Task';
import { CancellationError, JobFailureError, TransportError } from '../domain/errors';
import { IProgressIndicator } from '../domain/ports/IProgressIndicator';
import { ITaskEndpoint } from '../domain/ports/ITaskEndpoint';

export type PollerState = 'running' | 'succeeded' | 'failed' | 'aborted';

export interface PollConfig {
    /** Delay between the end of one status fetch and the start of the next */
    pollIntervalMs: number;
    /** Spinner redraw period (default: 100ms) */
    spinnerIntervalMs?: number;
    /** Optional overall deadline; absent means poll until a terminal state */
    maxWaitMs?: number;
    /** Cooperative cancellation, usually wired to SIGINT */
    signal?: AbortSignal;
}

export const DEFAULT_SPINNER_INTERVAL_MS = 100;

/**
 * Holds the most recent value written by one producer for one consumer.
 * Writes overwrite, reads never block.
 */
export class LatestValue<T> {
    constructor(private value: T) { }

    set(value: T): void {
        this.value = value;
    }

    get(): T {
        return this.value;
    }
}

/**
 * Drives one remote job to a terminal state.
 *
 * Two timers run side by side: the poll timer issues one status fetch at a
 * time, `pollIntervalMs` after the previous one finished, and the spinner timer
 * redraws the progress line with the last observed status label. A slow fetch
 * never delays a redraw because the fetch is just a pending promise.
 *
 * Outcomes:
 * - completed: resolves with the status payload
 * - failed / canceled / timed out: rejects with JobFailureError
 * - status fetch throws: rejects with that error, no retry
 * - signal aborted or deadline reached: rejects with CancellationError, and any
 *   poll result arriving afterwards is ignored
 *
 * Every exit path stops both timers and clears the progress line exactly once.
 * A poller instance is single-use.
 */
export class TaskPoller {
    private currentState: PollerState = 'running';
    private started = false;

    constructor(
        private readonly indicator: IProgressIndicator,
        private readonly config: PollConfig
    ) {
        if (!(config.pollIntervalMs > 0)) {
            throw new RangeError(`pollIntervalMs must be positive, got ${config.pollIntervalMs}`);
        }
        if (config.spinnerIntervalMs !== undefined && !(config.spinnerIntervalMs > 0)) {
            throw new RangeError(`spinnerIntervalMs must be positive, got ${config.spinnerIntervalMs}`);
        }
    }

    get state(): PollerState {
        return this.currentState;
    }

    waitForCompletion<TParams>(handle: TaskHandle, endpoint: ITaskEndpoint<TParams>): Promise<GeneratedArtifact> {
        if (this.started) {
            return Promise.reject(new Error('TaskPoller instances cannot be reused'));
        }
        this.started = true;

        const { pollIntervalMs, maxWaitMs, signal } = this.config;
        const spinnerIntervalMs = this.config.spinnerIntervalMs ?? DEFAULT_SPINNER_INTERVAL_MS;
        const jobLabel = TASK_KIND_LABELS[handle.kind];

        return new Promise<GeneratedArtifact>((resolve, reject) => {
            const lastStatus = new LatestValue<string>(endpoint.initialStatus);
            let settled = false;
            let pollTimer: NodeJS.Timeout | undefined;
            let spinnerTimer: NodeJS.Timeout | undefined;
            let deadlineTimer: NodeJS.Timeout | undefined;

            const finish = (state: PollerState, settle: () => void): void => {
                if (settled) return;
                settled = true;
                clearTimeout(pollTimer);
                clearInterval(spinnerTimer);
                clearTimeout(deadlineTimer);
                signal?.removeEventListener('abort', onAbort);
                this.indicator.clear();
                this.currentState = state;
                settle();
            };

            const onAbort = (): void => {
                finish('aborted', () => reject(new CancellationError(describeAbortReason(signal))));
            };

            const handleStatus = (status: TaskStatus): void => {
                lastStatus.set(status.label);

                if (status.state === 'completed' && status.payload) {
                    const payload = status.payload;
                    finish('succeeded', () => resolve(payload));
                    return;
                }
                if (isFailureState(status.state)) {
                    finish('failed', () => reject(new JobFailureError(jobLabel, status.label, status.errorDetail)));
                    return;
                }
                if (status.state === 'completed') {
                    finish('failed', () => reject(new TransportError(
                        'unexpected response from server: task completed without a result',
                        0,
                        `poll ${handle.kind} task`
                    )));
                    return;
                }
                schedulePoll();
            };

            const pollOnce = async (): Promise<void> => {
                if (settled) return;
                let status: TaskStatus;
                try {
                    status = await endpoint.poll(handle.id, signal);
                } catch (error) {
                    finish('failed', () => reject(error));
                    return;
                }
                // Cancellation observed while the fetch was in flight wins
                if (settled) return;
                handleStatus(status);
            };

            const schedulePoll = (): void => {
                pollTimer = setTimeout(() => {
                    void pollOnce();
                }, pollIntervalMs);
            };

            if (signal?.aborted) {
                onAbort();
                return;
            }
            signal?.addEventListener('abort', onAbort, { once: true });

            if (maxWaitMs !== undefined) {
                deadlineTimer = setTimeout(() => {
                    finish('aborted', () => reject(new CancellationError(
                        `no terminal status after ${formatSeconds(maxWaitMs)}`
                    )));
                }, maxWaitMs);
            }

            this.indicator.render(lastStatus.get());
            spinnerTimer = setInterval(() => this.indicator.render(lastStatus.get()), spinnerIntervalMs);
            schedulePoll();
        });
    }
}

export function describeAbortReason(signal?: AbortSignal): string {
    const reason: unknown = signal?.reason;
    if (reason instanceof Error && reason.name !== 'AbortError') {
        return reason.message;
    }
    if (typeof reason === 'string' && reason) {
        return reason;
    }
    return 'interrupted';
}

function formatSeconds(ms: number): string {
    return `${Math.round(ms / 100) / 10}s`;
}
