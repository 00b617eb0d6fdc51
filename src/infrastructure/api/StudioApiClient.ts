import axios, { AxiosError, AxiosInstance, AxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import fs from 'fs';
import path from 'path';
import { Avatar, BuildAvatarRequest, BuildAvatarResult, GenerateAvatarRequest } from '../../domain/entities/Avatar';
import {
    AsyncTaskAccepted,
    GenerateImageRequest,
    GenerateImageTaskStatus,
    GenerateTalkingAvatarRequest,
    TalkingAvatarTaskStatus,
} from '../../domain/entities/GenerationTask';
import {
    InteractiveSession,
    SessionProfile,
    StartSessionRequest,
    StartSessionResult,
    StopSessionsResult,
} from '../../domain/entities/InteractiveSession';
import { SpeechToTextResult, TextToSpeechRequest, TextToSpeechResult } from '../../domain/entities/Speech';
import { VoiceCloneRequest, VoiceCloneTaskStatus, VoiceProfile } from '../../domain/entities/Voice';
import { AuthenticationError, TransportError, ValidationError } from '../../domain/errors';
import { IStudioApiClient, RequestOptions } from '../../domain/ports/IStudioApiClient';
import { scanAudioFiles } from '../files/MediaFiles';

export interface StudioApiClientOptions {
    apiUrl: string;
    apiToken: string;
    /** Log each request and response status to stderr */
    debug?: boolean;
    /** Request timeout for regular calls (default: 5 minutes) */
    timeoutMs?: number;
}

/** Uploads of voice datasets can take a long time */
const UPLOAD_TIMEOUT_MS = 60 * 60 * 1000;

interface ApiEnvelope<T> {
    data?: T;
}

const HTTP_STATUS_TEXT: Record<number, string> = {
    400: 'Bad Request',
    401: 'Unauthorized',
    402: 'Payment Required',
    403: 'Forbidden',
    404: 'Not Found',
    409: 'Conflict',
    413: 'Payload Too Large',
    422: 'Unprocessable Entity',
    429: 'Too Many Requests',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
    503: 'Service Unavailable',
    504: 'Gateway Timeout',
};

/**
 * axios client for the media generation REST API.
 */
export class StudioApiClient implements IStudioApiClient {
    private readonly http: AxiosInstance;
    private readonly apiUrl: string;
    private readonly apiToken: string;

    constructor(options: StudioApiClientOptions) {
        if (!options.apiToken) {
            throw new AuthenticationError();
        }
        this.apiToken = options.apiToken;
        this.apiUrl = options.apiUrl.endsWith('/') ? options.apiUrl.slice(0, -1) : options.apiUrl;

        this.http = axios.create({
            baseURL: this.apiUrl,
            timeout: options.timeoutMs ?? 5 * 60 * 1000,
            headers: {
                'Authorization': `Bearer ${this.apiToken}`,
                'Content-Type': 'application/json',
            },
        });

        if (options.debug) {
            this.http.interceptors.request.use((config) => {
                console.error(`[StudioApi] ${(config.method ?? 'get').toUpperCase()} ${config.baseURL ?? ''}${config.url ?? ''}`);
                return config;
            });
            this.http.interceptors.response.use(
                (response) => {
                    console.error(`[StudioApi] <- ${response.status} ${response.config.url ?? ''}`);
                    return response;
                },
                (error: unknown) => {
                    if (axios.isAxiosError(error)) {
                        console.error(`[StudioApi] <- ${error.response?.status ?? 'network error'} ${error.config?.url ?? ''}`);
                    }
                    return Promise.reject(error);
                }
            );
        }
    }

    // Avatars

    listAvatars(options?: RequestOptions): Promise<Avatar[]> {
        return this.request<Avatar[]>('list avatars', { method: 'GET', url: '/v1/avatar' }, options, []);
    }

    getAvatar(avatarId: string, options?: RequestOptions): Promise<Avatar> {
        return this.request<Avatar>('get avatar', { method: 'GET', url: `/v1/avatar/${encodeURIComponent(avatarId)}` }, options);
    }

    async deleteAvatar(avatarId: string, options?: RequestOptions): Promise<void> {
        await this.send('delete avatar', { method: 'DELETE', url: `/v1/avatar/${encodeURIComponent(avatarId)}` }, options);
    }

    generateAvatar(request: GenerateAvatarRequest, options?: RequestOptions): Promise<AsyncTaskAccepted> {
        return this.request<AsyncTaskAccepted>('generate avatar', { method: 'POST', url: '/v1/avatar/async_generate', data: request }, options);
    }

    getAvatarGenerationStatus(taskId: string, options?: RequestOptions): Promise<GenerateImageTaskStatus> {
        return this.request<GenerateImageTaskStatus>(
            'get avatar status',
            { method: 'GET', url: `/v1/avatar/async_generate/${encodeURIComponent(taskId)}` },
            options
        );
    }

    buildAvatar(request: BuildAvatarRequest, options?: RequestOptions): Promise<BuildAvatarResult> {
        return this.request<BuildAvatarResult>('build avatar', { method: 'POST', url: '/v1/avatar/async_build', data: request }, options);
    }

    // Images

    generateImage(request: GenerateImageRequest, options?: RequestOptions): Promise<AsyncTaskAccepted> {
        return this.request<AsyncTaskAccepted>('generate image', { method: 'POST', url: '/v1/image/async_generate', data: request }, options);
    }

    getImageGenerationStatus(taskId: string, options?: RequestOptions): Promise<GenerateImageTaskStatus> {
        return this.request<GenerateImageTaskStatus>(
            'get image status',
            { method: 'GET', url: `/v1/image/async_generate/${encodeURIComponent(taskId)}` },
            options
        );
    }

    // Videos

    generateTalkingAvatar(request: GenerateTalkingAvatarRequest, options?: RequestOptions): Promise<AsyncTaskAccepted> {
        return this.request<AsyncTaskAccepted>(
            'generate talking avatar video',
            { method: 'POST', url: '/v1/video/async_generate_talking_avatar', data: request },
            options
        );
    }

    getTalkingAvatarStatus(taskId: string, options?: RequestOptions): Promise<TalkingAvatarTaskStatus> {
        return this.request<TalkingAvatarTaskStatus>(
            'get talking avatar video status',
            { method: 'GET', url: `/v1/video/async_generate_talking_avatar/${encodeURIComponent(taskId)}` },
            options
        );
    }

    // Speech

    speechToText(audioBase64: string, options?: RequestOptions): Promise<SpeechToTextResult> {
        return this.request<SpeechToTextResult>('speech to text', { method: 'POST', url: '/v1/speech/stt', data: { audio: audioBase64 } }, options);
    }

    textToSpeech(request: TextToSpeechRequest, options?: RequestOptions): Promise<TextToSpeechResult> {
        return this.request<TextToSpeechResult>('text to speech', { method: 'POST', url: '/v1/speech/tts', data: request }, options);
    }

    // Voice profiles

    listPremadeVoiceProfiles(options?: RequestOptions): Promise<VoiceProfile[]> {
        return this.request<VoiceProfile[]>('list voice profiles', { method: 'GET', url: '/v1/voice/premade_profiles' }, options, []);
    }

    listVoiceProfiles(options?: RequestOptions): Promise<VoiceProfile[]> {
        return this.request<VoiceProfile[]>('list custom voice profiles', { method: 'GET', url: '/v1/voice/profiles' }, options, []);
    }

    getVoiceProfile(profileId: string, options?: RequestOptions): Promise<VoiceProfile> {
        return this.request<VoiceProfile>(
            'get voice profile',
            { method: 'GET', url: `/v1/voice/profiles/${encodeURIComponent(profileId)}` },
            options
        );
    }

    async deleteVoiceProfile(profileId: string, options?: RequestOptions): Promise<void> {
        await this.send('delete voice profile', { method: 'DELETE', url: `/v1/voice/profiles/${encodeURIComponent(profileId)}` }, options);
    }

    /**
     * Uploads the annotation list and every audio sample as one multipart form.
     * Files are streamed from disk rather than read into memory.
     */
    async cloneVoice(request: VoiceCloneRequest, options?: RequestOptions): Promise<AsyncTaskAccepted> {
        const audioFiles = await scanAudioFiles(request.audioDir);
        if (audioFiles.length === 0) {
            throw new ValidationError(`no audio files (.wav or .mp3) found in directory: ${request.audioDir}`);
        }

        const form = new FormData();
        form.append('name', request.name);
        form.append('clean_data', request.cleanData ? 'true' : 'false');
        form.append('annotation_list', fs.createReadStream(request.annotationFile), {
            filename: path.basename(request.annotationFile),
            contentType: 'text/plain',
        });
        for (const audioFile of audioFiles) {
            form.append('audio_samples', fs.createReadStream(audioFile), {
                filename: path.basename(audioFile),
                contentType: 'audio/wav',
            });
        }

        console.log(`Uploading ${audioFiles.length} audio files for voice cloning...`);

        return this.request<AsyncTaskAccepted>(
            'clone voice',
            {
                method: 'POST',
                url: '/v1/voice/clone',
                data: form,
                headers: form.getHeaders(),
                timeout: UPLOAD_TIMEOUT_MS,
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
            },
            options
        );
    }

    getVoiceCloneStatus(taskId: string, options?: RequestOptions): Promise<VoiceCloneTaskStatus> {
        return this.request<VoiceCloneTaskStatus>(
            'get voice clone status',
            { method: 'GET', url: `/v1/voice/clone/${encodeURIComponent(taskId)}` },
            options
        );
    }

    // Interactive sessions

    listSessions(options?: RequestOptions): Promise<InteractiveSession[]> {
        return this.request<InteractiveSession[]>('list sessions', { method: 'GET', url: '/v1/interactive/list' }, options, []);
    }

    startSession(request: StartSessionRequest, options?: RequestOptions): Promise<StartSessionResult> {
        return this.request<StartSessionResult>('start session', { method: 'POST', url: '/v1/interactive/start', data: request }, options);
    }

    stopSessions(sessionIds: string[], options?: RequestOptions): Promise<StopSessionsResult> {
        return this.request<StopSessionsResult>(
            'stop sessions',
            { method: 'POST', url: '/v1/interactive/stop', data: { session_ids: sessionIds } },
            options
        );
    }

    getSessionProfile(sessionId: string, options?: RequestOptions): Promise<SessionProfile> {
        return this.request<SessionProfile>(
            'get session profile',
            { method: 'GET', url: `/v1/interactive/session/${encodeURIComponent(sessionId)}/profile` },
            options
        );
    }

    /**
     * Sends the request and unwraps the `data` envelope. List endpoints pass a
     * fallback so an absent body reads as an empty list.
     */
    private async request<T>(
        context: string,
        config: AxiosRequestConfig,
        options?: RequestOptions,
        fallback?: T
    ): Promise<T> {
        const body = await this.send<ApiEnvelope<T>>(context, config, options);
        if (body?.data !== undefined && body.data !== null) {
            return body.data;
        }
        if (fallback !== undefined) {
            return fallback;
        }
        throw new TransportError('unexpected response from server', 0, context);
    }

    private async send<T>(context: string, config: AxiosRequestConfig, options?: RequestOptions): Promise<T | undefined> {
        try {
            const response = await this.http.request<T>({ ...config, signal: options?.signal });
            return response.data;
        } catch (error) {
            throw toTransportError(error, context);
        }
    }
}

/**
 * Maps an axios failure onto TransportError, keeping the server's detail message.
 */
export function toTransportError(error: unknown, context: string): TransportError {
    if (error instanceof TransportError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        const axiosError: AxiosError<unknown> = error;
        const status = axiosError.response?.status;
        if (status !== undefined) {
            const detail = readErrorDetail(axiosError.response?.data);
            const message = detail
                ? `API error (${status}): ${detail}`
                : `API error (${status}): ${HTTP_STATUS_TEXT[status] ?? 'Unknown Status'}`;
            return new TransportError(message, status, context, detail, { cause: error });
        }
        return new TransportError(`failed to ${context}: ${axiosError.message}`, 0, context, undefined, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`failed to ${context}: ${message}`, 0, context, undefined, { cause: error });
}

function readErrorDetail(data: unknown): string | undefined {
    if (typeof data === 'string') {
        return data.trim() || undefined;
    }
    // Error bodies look like { title, status, detail }
    if (typeof data === 'object' && data !== null && 'detail' in data) {
        const detail: unknown = data.detail;
        return typeof detail === 'string' && detail ? detail : undefined;
    }
    return undefined;
}
