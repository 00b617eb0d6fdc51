export interface InteractiveSession {
    session_id: string;
    metis_model: string;
    state?: string;
    desired_state?: string;
    start_time: string;
}

export interface StartSessionRequest {
    avatar_id: string;
    model: string;
    llm_model: string;
    voice_profile_id: string;
    instruction: string;
    tools?: string;
}

export interface StartSessionResult {
    session: InteractiveSession;
    session_token: string;
}

export interface StopSessionsResult {
    stopped_sessions?: string[];
}

export interface SessionProfile {
    session_id?: string;
    avatar_id?: string;
    model?: string;
    llm_model?: string;
    voice_profile_id?: string;
    instruction?: string;
    tools?: string;
}
