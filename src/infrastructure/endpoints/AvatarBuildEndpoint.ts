import { BuildAvatarRequest } from '../../domain/entities/Avatar';
import { TaskHandle, TaskStatus, createStatusClassifier } from '../../domain/entities/Task';
import { TransportError } from '../../domain/errors';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { ITaskEndpoint } from '../../domain/ports/ITaskEndpoint';
import { AVATAR_BUILD_VOCABULARY, toTaskStatus } from './statusMapping';

const classify = createStatusClassifier(AVATAR_BUILD_VOCABULARY);

/**
 * Builds a live avatar from a base image. There is no separate task resource:
 * the returned avatar id is polled through the avatar itself.
 */
export class AvatarBuildEndpoint implements ITaskEndpoint<BuildAvatarRequest> {
    readonly kind = 'avatarBuild';
    readonly initialStatus = 'PENDING';

    constructor(private readonly client: IStudioApiClient) { }

    async start(params: BuildAvatarRequest, signal?: AbortSignal): Promise<TaskHandle> {
        const result = await this.client.buildAvatar(params, { signal });
        if (!result.avatar_id) {
            throw new TransportError('unexpected response from server: missing avatar id', 0, 'build avatar');
        }
        return { id: result.avatar_id, kind: this.kind };
    }

    async poll(avatarId: string, signal?: AbortSignal): Promise<TaskStatus> {
        const avatar = await this.client.getAvatar(avatarId, { signal });
        return toTaskStatus(classify, avatar.status, { kind: 'identifier', data: avatar.id || avatarId });
    }
}
