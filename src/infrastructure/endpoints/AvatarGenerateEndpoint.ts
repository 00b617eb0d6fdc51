import { GenerateAvatarRequest } from '../../domain/entities/Avatar';
import { MEDIA_PROFILES, MediaProfile } from '../../domain/entities/GeneratedArtifact';
import { TaskHandle, TaskStatus, createStatusClassifier } from '../../domain/entities/Task';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { GENERATION_VOCABULARY, requireTaskId, toTaskStatus } from './statusMapping';

const classify = createStatusClassifier(GENERATION_VOCABULARY);

/**
 * Text-to-avatar generation. The finished image comes back inline as base64.
 */
export class AvatarGenerateEndpoint implements ITaskEndpoint<GenerateAvatarRequest> {
    readonly kind = 'avatarGenerate';
    readonly initialStatus = 'PROCESSING';
    readonly mediaProfile: MediaProfile = MEDIA_PROFILES.avatar;

    constructor(private readonly client: IStudioApiClient) { }

    async start(params: GenerateAvatarRequest, signal?: AbortSignal): Promise<TaskHandle> {
        const accepted = await this.client.generateAvatar(params, { signal });
        return { id: requireTaskId(accepted, 'generate avatar'), kind: this.kind };
    }

    async poll(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const status = await this.client.getAvatarGenerationStatus(taskId, { signal });
        const image = status.image ? { kind: 'inlineBase64' as const, data: status.image } : undefined;
        return toTaskStatus(classify, status.status, image, status.error);
    }
}
