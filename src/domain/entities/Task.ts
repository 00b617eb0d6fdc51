import { GeneratedArtifact } from './GeneratedArtifact';

/**
 * The kinds of long-running server-side jobs the CLI can start and follow.
 */
export type TaskKind =
    | 'avatarBuild'
    | 'avatarGenerate'
    | 'imageGenerate'
    | 'videoGenerate'
    | 'voiceClone';

/**
 * Shared state set every endpoint's wire vocabulary is mapped onto.
 */
export type TaskState =
    | 'pending'
    | 'processing'
    | 'completed'
    | 'failed'
    | 'canceled'
    | 'timedOut';

export type FailureState = Extract<TaskState, 'failed' | 'canceled' | 'timedOut'>;

/**
 * Identifier for a started asynchronous job. Only lives for one poll loop.
 */
export interface TaskHandle {
    id: string;
    kind: TaskKind;
}

/**
 * One immutable snapshot of job progress.
 */
export interface TaskStatus {
    readonly state: TaskState;
    /** Literal status string as the service sent it */
    readonly label: string;
    /** Only present when state is 'completed' */
    readonly payload?: GeneratedArtifact;
    /** Only present for failure states */
    readonly errorDetail?: string;
}

const FAILURE_STATES: readonly TaskState[] = ['failed', 'canceled', 'timedOut'];

/**
 * Human-readable names used in progress and failure messages.
 */
export const TASK_KIND_LABELS: Record<TaskKind, string> = {
    avatarBuild: 'Avatar build',
    avatarGenerate: 'Avatar generation',
    imageGenerate: 'Image generation',
    videoGenerate: 'Talking avatar video generation',
    voiceClone: 'Voice cloning',
};

export function isFailureState(state: TaskState): state is FailureState {
    return FAILURE_STATES.includes(state);
}

/**
 * True for any state after which polling is pointless.
 */
export function isTerminalState(state: TaskState): boolean {
    return state === 'completed' || isFailureState(state);
}

/**
 * Builds a frozen TaskStatus, rejecting snapshots that break the
 * payload/errorDetail invariants.
 */
export function createTaskStatus(fields: {
    state: TaskState;
    label: string;
    payload?: GeneratedArtifact;
    errorDetail?: string;
}): TaskStatus {
    const { state, label, payload, errorDetail } = fields;

    if (state === 'completed' && !payload) {
        throw new Error(`Task status ${label} is completed but carries no result`);
    }
    if (state !== 'completed' && payload) {
        throw new Error(`Task status ${label} carries a result but is not completed`);
    }
    if (errorDetail !== undefined && !isFailureState(state)) {
        throw new Error(`Task status ${label} carries an error detail but is not a failure`);
    }

    const status: TaskStatus = {
        state,
        label,
        ...(payload ? { payload } : {}),
        ...(errorDetail !== undefined && errorDetail !== '' ? { errorDetail } : {}),
    };
    return Object.freeze(status);
}

/**
 * Describes one endpoint's status strings. Matching is exact and
 * case-sensitive; labels not listed anywhere count as still processing.
 */
export interface StatusVocabulary {
    completed: readonly string[];
    failed: readonly string[];
    canceled?: readonly string[];
    timedOut?: readonly string[];
    pending?: readonly string[];
}

/**
 * Returns a classifier that maps a literal wire status onto a TaskState.
 */
export function createStatusClassifier(vocabulary: StatusVocabulary): (label: string) => TaskState {
    return (label: string): TaskState => {
        if (vocabulary.completed.includes(label)) return 'completed';
        if (vocabulary.failed.includes(label)) return 'failed';
        if (vocabulary.canceled?.includes(label)) return 'canceled';
        if (vocabulary.timedOut?.includes(label)) return 'timedOut';
        if (vocabulary.pending?.includes(label)) return 'pending';
        return 'processing';
    };
}
