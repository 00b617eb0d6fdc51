import { Avatar, BuildAvatarRequest, BuildAvatarResult, GenerateAvatarRequest } from '../entities/Avatar';
import {
    AsyncTaskAccepted,
    GenerateImageRequest,
    GenerateImageTaskStatus,
    GenerateTalkingAvatarRequest,
    TalkingAvatarTaskStatus,
} from '../entities/GenerationTask';
import {
    InteractiveSession,
    SessionProfile,
    StartSessionRequest,
    StartSessionResult,
    StopSessionsResult,
} from '../entities/InteractiveSession';
import { SpeechToTextResult, TextToSpeechRequest, TextToSpeechResult } from '../entities/Speech';
import { VoiceCloneRequest, VoiceCloneTaskStatus, VoiceProfile } from '../entities/Voice';

/**
 * Per-call options. The signal aborts the underlying HTTP request.
 */
export interface RequestOptions {
    signal?: AbortSignal;
}

/**
 * IStudioApiClient - Port for the remote media generation REST API.
 * Every method resolves with the response's `data` body or throws a TransportError.
 * Implementations: StudioApiClient (axios)
 */
export interface IStudioApiClient {
    // Avatars
    listAvatars(options?: RequestOptions): Promise<Avatar[]>;
    getAvatar(avatarId: string, options?: RequestOptions): Promise<Avatar>;
    deleteAvatar(avatarId: string, options?: RequestOptions): Promise<void>;
    generateAvatar(request: GenerateAvatarRequest, options?: RequestOptions): Promise<AsyncTaskAccepted>;
    getAvatarGenerationStatus(taskId: string, options?: RequestOptions): Promise<GenerateImageTaskStatus>;
    buildAvatar(request: BuildAvatarRequest, options?: RequestOptions): Promise<BuildAvatarResult>;

    // Images
    generateImage(request: GenerateImageRequest, options?: RequestOptions): Promise<AsyncTaskAccepted>;
    getImageGenerationStatus(taskId: string, options?: RequestOptions): Promise<GenerateImageTaskStatus>;

    // Videos
    generateTalkingAvatar(request: GenerateTalkingAvatarRequest, options?: RequestOptions): Promise<AsyncTaskAccepted>;
    getTalkingAvatarStatus(taskId: string, options?: RequestOptions): Promise<TalkingAvatarTaskStatus>;

    // Speech
    speechToText(audioBase64: string, options?: RequestOptions): Promise<SpeechToTextResult>;
    textToSpeech(request: TextToSpeechRequest, options?: RequestOptions): Promise<TextToSpeechResult>;

    // Voice profiles
    listPremadeVoiceProfiles(options?: RequestOptions): Promise<VoiceProfile[]>;
    listVoiceProfiles(options?: RequestOptions): Promise<VoiceProfile[]>;
    getVoiceProfile(profileId: string, options?: RequestOptions): Promise<VoiceProfile>;
    deleteVoiceProfile(profileId: string, options?: RequestOptions): Promise<void>;
    cloneVoice(request: VoiceCloneRequest, options?: RequestOptions): Promise<AsyncTaskAccepted>;
    getVoiceCloneStatus(taskId: string, options?: RequestOptions): Promise<VoiceCloneTaskStatus>;

    // Interactive sessions
    listSessions(options?: RequestOptions): Promise<InteractiveSession[]>;
    startSession(request: StartSessionRequest, options?: RequestOptions): Promise<StartSessionResult>;
    stopSessions(sessionIds: string[], options?: RequestOptions): Promise<StopSessionsResult>;
    getSessionProfile(sessionId: string, options?: RequestOptions): Promise<SessionProfile>;
}
