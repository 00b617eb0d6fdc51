export interface VoiceProfile {
    id: string;
    name?: string;
    description?: string;
    status?: string;
    created_at?: string;
    is_premade?: boolean;
    user_id?: string;
    sample_clip?: string;
    languages?: string[];
}

export interface VoiceCloneRequest {
    name: string;
    audioDir: string;
    annotationFile: string;
    cleanData: boolean;
}

export interface VoiceCloneTaskStatus {
    task_id: string;
    /** PENDING, PROCESSING, COMPLETED, FAILED, CANCELLED, TIMED_OUT */
    status: string;
    profile_id?: string;
    error?: string;
}
