import { GeneratedArtifact } from '../../domain/entities/GeneratedArtifact';
import { AsyncTaskAccepted } from '../../domain/entities/GenerationTask';
import { StatusVocabulary, TaskState, TaskStatus, createTaskStatus, isFailureState } from '../../domain/entities/Task';
import { TransportError } from '../../domain/errors';

const QUEUED_LABELS = ['PENDING', 'IN_QUEUE', 'QUEUED'];

/** Avatar, image and talking-avatar generation jobs */
export const GENERATION_VOCABULARY: StatusVocabulary = {
    completed: ['COMPLETED'],
    failed: ['FAILED'],
    canceled: ['CANCELED'],
    timedOut: ['TIMEDOUT'],
    pending: QUEUED_LABELS,
};

/** Avatar builds report the avatar's own status */
export const AVATAR_BUILD_VOCABULARY: StatusVocabulary = {
    completed: ['READY'],
    failed: ['ERROR'],
    pending: QUEUED_LABELS,
};

/** Voice cloning spells its terminal states differently */
export const VOICE_CLONE_VOCABULARY: StatusVocabulary = {
    completed: ['COMPLETED'],
    failed: ['FAILED'],
    canceled: ['CANCELLED'],
    timedOut: ['TIMED_OUT'],
    pending: QUEUED_LABELS,
};

/**
 * Maps one raw status response onto a TaskStatus.
 *
 * `result` is only read when the label is a completion, `error` only when it
 * is a failure. A completion without a result is a protocol violation.
 */
export function toTaskStatus(
    classify: (label: string) => TaskState,
    label: string,
    result: GeneratedArtifact | undefined,
    error?: string
): TaskStatus {
    const state = classify(label);

    if (state === 'completed') {
        if (!result || !result.data) {
            throw new TransportError('unexpected response from server: task completed without a result');
        }
        return createTaskStatus({ state, label, payload: result });
    }
    if (isFailureState(state)) {
        return createTaskStatus({ state, label, errorDetail: error });
    }
    return createTaskStatus({ state, label });
}

export function requireTaskId(accepted: AsyncTaskAccepted, context: string): string {
    if (!accepted.task_id) {
        throw new TransportError('unexpected response from server: missing task id', 0, context);
    }
    return accepted.task_id;
}
