import { MEDIA_PROFILES, MediaProfile } from '../../domain/entities/GeneratedArtifact';
import { GenerateTalkingAvatarRequest } from '../../domain/entities/GenerationTask';
import { TaskHandle, TaskStatus, createStatusClassifier } from '../../domain/entities/Task';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { GENERATION_VOCABULARY, requireTaskId, toTaskStatus } from './statusMapping';

const classify = createStatusClassifier(GENERATION_VOCABULARY);

/**
 * Talking-avatar video generation. The result is a URL to download.
 */
export class VideoGenerateEndpoint implements ITaskEndpoint<GenerateTalkingAvatarRequest> {
    readonly kind = 'videoGenerate';
    readonly initialStatus = 'PROCESSING';
    readonly mediaProfile: MediaProfile = MEDIA_PROFILES.video;

    constructor(private readonly client: IStudioApiClient) { }

    async start(params: GenerateTalkingAvatarRequest, signal?: AbortSignal): Promise<TaskHandle> {
        const accepted = await this.client.generateTalkingAvatar(params, { signal });
        return { id: requireTaskId(accepted, 'generate talking avatar video'), kind: this.kind };
    }

    async poll(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const status = await this.client.getTalkingAvatarStatus(taskId, { signal });
        const video = status.file_url ? { kind: 'remoteUrl' as const, data: status.file_url } : undefined;
        return toTaskStatus(classify, status.status, video, status.error);
    }
}
