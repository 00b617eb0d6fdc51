import { GeneratedArtifact, MaterializedArtifact, MediaProfile } from '../../domain/entities/GeneratedArtifact';
import { TASK_KIND_LABELS, TaskHandle, TaskStatus, isFailureState } from '../../domain/entities/Task';
import { CancellationError, JobFailureError } from '../../domain/errors';
import { IProgressIndicator } from '../../domain/ports/IProgressIndicator';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { ArtifactMaterializer } from '../../infrastructure/storage/ArtifactMaterializer';
import { DEFAULT_SPINNER_INTERVAL_MS, TaskPoller, describeAbortReason } from '../TaskPoller';

export interface GenerationRunOptions {
    pollIntervalMs: number;
    maxWaitMs?: number;
    /** Skip writing the result; only describe it */
    skipSave?: boolean;
    outputPath?: string;
    saveDir: string;
    signal?: AbortSignal;
}

export interface GenerationOutcome {
    handle: TaskHandle;
    artifact: GeneratedArtifact;
    result: MaterializedArtifact;
}

export interface SaveOptions {
    /** Report the artifact without writing it */
    skipSave?: boolean;
    outputPath?: string;
    saveDir: string;
    signal?: AbortSignal;
}

/**
 * GenerationService runs one remote job end to end: start, poll until a
 * terminal state, then materialize the result.
 * Shared by every generate/build/clone command.
 */
export class GenerationService {
    constructor(
        private readonly materializer: ArtifactMaterializer,
        private readonly createIndicator: () => IProgressIndicator,
        private readonly spinnerIntervalMs: number = DEFAULT_SPINNER_INTERVAL_MS
    ) { }

    async run<TParams>(
        endpoint: ITaskEndpoint<TParams>,
        params: TParams,
        options: GenerationRunOptions
    ): Promise<GenerationOutcome> {
        const label = TASK_KIND_LABELS[endpoint.kind];

        console.log(`🚀 Starting ${label.toLowerCase()}...`);
        const handle = await endpoint.start(params, options.signal);
        console.log(`✅ ${label} started!`);
        console.log(`   Task ID: ${handle.id}`);
        console.log('⏳ Waiting for completion...');

        const poller = new TaskPoller(this.createIndicator(), {
            pollIntervalMs: options.pollIntervalMs,
            spinnerIntervalMs: this.spinnerIntervalMs,
            maxWaitMs: options.maxWaitMs,
            signal: options.signal,
        });
        const artifact = await poller.waitForCompletion(handle, endpoint);
        console.log(`✅ ${label} completed!`);

        const result = await this.materialize(artifact, endpoint.mediaProfile, {
            skipSave: options.skipSave ?? false,
            outputPath: options.outputPath,
            saveDir: options.saveDir,
            signal: options.signal,
        });
        this.report(result, endpoint.mediaProfile);

        return { handle, artifact, result };
    }

    /**
     * Fetches the status of an existing task once. Failure states raise
     * JobFailureError so callers only see pending, processing or completed.
     */
    async checkStatus<TParams>(endpoint: ITaskEndpoint<TParams>, taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const status = await endpoint.poll(taskId, signal);
        if (isFailureState(status.state)) {
            throw new JobFailureError(TASK_KIND_LABELS[endpoint.kind], status.label, status.errorDetail);
        }
        return status;
    }

    /**
     * Saves an artifact obtained outside `run`, e.g. from a status check.
     */
    async save(artifact: GeneratedArtifact, profile: MediaProfile, options: SaveOptions): Promise<MaterializedArtifact> {
        const result = await this.materialize(artifact, profile, { ...options, skipSave: options.skipSave ?? false });
        this.report(result, profile);
        return result;
    }

    /**
     * Shows the spinner with a fixed label while a single blocking call runs.
     * Used by the synchronous speech endpoints. The line is cleared exactly
     * once, and an abort settles immediately with CancellationError.
     */
    runWithProgress<T>(label: string, work: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
        const indicator = this.createIndicator();

        return new Promise<T>((resolve, reject) => {
            let settled = false;
            let spinnerTimer: NodeJS.Timeout | undefined;

            const finish = (settle: () => void): void => {
                if (settled) return;
                settled = true;
                clearInterval(spinnerTimer);
                signal?.removeEventListener('abort', onAbort);
                indicator.clear();
                settle();
            };

            const onAbort = (): void => {
                finish(() => reject(new CancellationError(describeAbortReason(signal))));
            };

            if (signal?.aborted) {
                onAbort();
                return;
            }
            signal?.addEventListener('abort', onAbort, { once: true });

            indicator.render(label);
            spinnerTimer = setInterval(() => indicator.render(label), this.spinnerIntervalMs);

            work(signal).then(
                (value) => finish(() => resolve(value)),
                (error: unknown) => finish(() => reject(error))
            );
        });
    }

    private async materialize(
        artifact: GeneratedArtifact,
        profile: MediaProfile | undefined,
        options: Omit<SaveOptions, 'skipSave'> & { skipSave: boolean }
    ): Promise<MaterializedArtifact> {
        if (!profile) {
            // Builds and clones finish with an id, there is nothing to write
            return { saved: false, kind: artifact.kind, id: artifact.data, description: `ID: ${artifact.data}` };
        }
        return this.materializer.materialize({
            artifact,
            profile,
            skipSave: options.skipSave,
            outputPath: options.outputPath,
            saveDir: options.saveDir,
            signal: options.signal,
        });
    }

    private report(result: MaterializedArtifact, profile?: MediaProfile): void {
        if (result.saved) {
            console.log(`💾 ${profile?.noun ?? 'File'} saved to: ${result.path}`);
            return;
        }
        if (result.kind !== 'identifier') {
            console.log(`📦 ${profile?.noun ?? 'Result'} generated (${result.description}) - skipping save due to --no-save flag`);
        }
    }
}
