import { MediaProfile } from '../entities/GeneratedArtifact';
import { TaskHandle, TaskKind, TaskStatus } from '../entities/Task';

/**
 * ITaskEndpoint - Binding between the generic poller and one remote job type.
 * Supplies the start call, the status call and that endpoint's vocabulary.
 */
export interface ITaskEndpoint<TParams> {
    readonly kind: TaskKind;
    /** Label the spinner shows before the first poll returns */
    readonly initialStatus: string;
    /** Where a completed artifact is saved, if it is a file at all */
    readonly mediaProfile?: MediaProfile;

    /**
     * Starts the job and returns its handle.
     */
    start(params: TParams, signal?: AbortSignal): Promise<TaskHandle>;

    /**
     * Fetches one fresh status snapshot.
     */
    poll(taskId: string, signal?: AbortSignal): Promise<TaskStatus>;
}
