import { MEDIA_PROFILES, MediaProfile } from '../../domain/entities/GeneratedArtifact';
import { GenerateImageRequest } from '../../domain/entities/GenerationTask';
import { TaskHandle, TaskStatus, createStatusClassifier } from '../../domain/entities/Task';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { GENERATION_VOCABULARY, requireTaskId, toTaskStatus } from './statusMapping';

const classify = createStatusClassifier(GENERATION_VOCABULARY);

export class ImageGenerateEndpoint implements ITaskEndpoint<GenerateImageRequest> {
    readonly kind = 'imageGenerate';
    readonly initialStatus = 'PROCESSING';
    readonly mediaProfile: MediaProfile = MEDIA_PROFILES.image;

    constructor(private readonly client: IStudioApiClient) { }

    async start(params: GenerateImageRequest, signal?: AbortSignal): Promise<TaskHandle> {
        const accepted = await this.client.generateImage(params, { signal });
        return { id: requireTaskId(accepted, 'generate image'), kind: this.kind };
    }

    async poll(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const status = await this.client.getImageGenerationStatus(taskId, { signal });
        const image = status.image ? { kind: 'inlineBase64' as const, data: status.image } : undefined;
        return toTaskStatus(classify, status.status, image, status.error);
    }
}
