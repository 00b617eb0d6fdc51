import { IProgressIndicator } from '../../../src/domain/ports/IProgressIndicator';
import { IStudioApiClient } from '../../../src/domain/ports/IStudioApiClient';
import { LineWriter } from '../../../src/presentation/ui/TerminalSpinner';

export class RecordingIndicator implements IProgressIndicator {
    readonly frames: string[] = [];
    clears = 0;

    render(status: string): void {
        this.frames.push(status);
    }

    clear(): void {
        this.clears++;
    }
}

export class RecordingWriter implements LineWriter {
    readonly chunks: string[] = [];

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return true;
    }

    get text(): string {
        return this.chunks.join('');
    }
}

const notStubbed = (): Promise<never> => Promise.reject(new Error('not stubbed'));

/**
 * API client whose methods all reject unless overridden.
 */
export function createMockClient(overrides: Partial<IStudioApiClient> = {}): IStudioApiClient {
    return {
        listAvatars: notStubbed,
        getAvatar: notStubbed,
        deleteAvatar: notStubbed,
        generateAvatar: notStubbed,
        getAvatarGenerationStatus: notStubbed,
        buildAvatar: notStubbed,
        generateImage: notStubbed,
        getImageGenerationStatus: notStubbed,
        generateTalkingAvatar: notStubbed,
        getTalkingAvatarStatus: notStubbed,
        speechToText: notStubbed,
        textToSpeech: notStubbed,
        listPremadeVoiceProfiles: notStubbed,
        listVoiceProfiles: notStubbed,
        getVoiceProfile: notStubbed,
        deleteVoiceProfile: notStubbed,
        cloneVoice: notStubbed,
        getVoiceCloneStatus: notStubbed,
        listSessions: notStubbed,
        startSession: notStubbed,
        stopSessions: notStubbed,
        getSessionProfile: notStubbed,
        ...overrides,
    };
}
