import { TaskHandle, TaskStatus, createStatusClassifier } from '../../domain/entities/Task';
import { VoiceCloneRequest } from '../../domain/entities/Voice';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { VOICE_CLONE_VOCABULARY, requireTaskId, toTaskStatus } from './statusMapping';

const classify = createStatusClassifier(VOICE_CLONE_VOCABULARY);

/**
 * Voice cloning from an uploaded dataset. Completes with a voice profile id.
 */
export class VoiceCloneEndpoint implements ITaskEndpoint<VoiceCloneRequest> {
    readonly kind = 'voiceClone';
    readonly initialStatus = 'PENDING';

    constructor(private readonly client: IStudioApiClient) { }

    async start(params: VoiceCloneRequest, signal?: AbortSignal): Promise<TaskHandle> {
        const accepted = await this.client.cloneVoice(params, { signal });
        return { id: requireTaskId(accepted, 'clone voice'), kind: this.kind };
    }

    async poll(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const status = await this.client.getVoiceCloneStatus(taskId, { signal });
        const profile = status.profile_id ? { kind: 'identifier' as const, data: status.profile_id } : undefined;
        return toTaskStatus(classify, status.status, profile, status.error);
    }
}
