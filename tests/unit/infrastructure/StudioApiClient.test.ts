import fs from 'fs';
import nock from 'nock';
import os from 'os';
import path from 'path';
import { AuthenticationError, TransportError, ValidationError } from '../../../src/domain/errors';
import { StudioApiClient } from '../../../src/infrastructure/api/StudioApiClient';

describe('StudioApiClient', () => {
    const apiUrl = 'https://api.example.test';
    const apiToken = 'test-secret';

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should require an API token', () => {
        expect(() => new StudioApiClient({ apiUrl, apiToken: '' })).toThrow(AuthenticationError);
    });

    it('should send the bearer token and unwrap the data envelope', async () => {
        const avatars = [{ id: 'av-1', name: 'Nova', status: 'READY', created_at: '2024-05-01T10:00:00Z', user_id: 'u-1' }];
        nock(apiUrl)
            .get('/v1/avatar')
            .matchHeader('authorization', 'Bearer test-secret')
            .reply(200, { data: avatars });

        const client = new StudioApiClient({ apiUrl, apiToken });

        await expect(client.listAvatars()).resolves.toEqual(avatars);
    });

    it('should strip a trailing slash from the base URL', async () => {
        nock(apiUrl).get('/v1/voice/premade_profiles').reply(200, { data: [{ id: 'v-1', name: 'Calm' }] });

        const client = new StudioApiClient({ apiUrl: `${apiUrl}/`, apiToken });

        await expect(client.listPremadeVoiceProfiles()).resolves.toEqual([{ id: 'v-1', name: 'Calm' }]);
    });

    it('should read an absent list body as empty', async () => {
        nock(apiUrl).get('/v1/interactive/list').reply(200, {});

        const client = new StudioApiClient({ apiUrl, apiToken });

        await expect(client.listSessions()).resolves.toEqual([]);
    });

    it('should reject a missing body for single resources', async () => {
        nock(apiUrl).get('/v1/avatar/av-1').reply(200, {});

        const client = new StudioApiClient({ apiUrl, apiToken });

        await expect(client.getAvatar('av-1')).rejects.toThrow('unexpected response from server');
    });

    it('should post the session ids to stop', async () => {
        nock(apiUrl)
            .post('/v1/interactive/stop', { session_ids: ['s-1', 's-2'] })
            .reply(200, { data: { stopped_sessions: ['s-1'] } });

        const client = new StudioApiClient({ apiUrl, apiToken });

        await expect(client.stopSessions(['s-1', 's-2'])).resolves.toEqual({ stopped_sessions: ['s-1'] });
    });

    it('should map an error body to TransportError with the server detail', async () => {
        nock(apiUrl)
            .post('/v1/image/async_generate')
            .reply(402, { title: 'Payment Required', status: 402, detail: 'Not enough credits' });

        const client = new StudioApiClient({ apiUrl, apiToken });
        const error = await client.generateImage({ prompt: 'a red fox', aspect_ratio: '16:9' }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        if (!(error instanceof TransportError)) return;
        expect(error.message).toBe('API error (402): Not enough credits');
        expect(error.statusCode).toBe(402);
        expect(error.detail).toBe('Not enough credits');
        expect(error.isInsufficientCredits()).toBe(true);
        expect(error.getUserFriendlyMessage()).toBe('Insufficient credits. Please upgrade your plan or purchase more credits');
    });

    it('should fall back to the status text when the body has no detail', async () => {
        nock(apiUrl).get('/v1/voice/profiles/v-9').reply(500);

        const client = new StudioApiClient({ apiUrl, apiToken });

        await expect(client.getVoiceProfile('v-9')).rejects.toThrow('API error (500): Internal Server Error');
    });

    it('should wrap network failures with the request context', async () => {
        nock(apiUrl).get('/v1/avatar').replyWithError('socket hang up');

        const client = new StudioApiClient({ apiUrl, apiToken });
        const error = await client.listAvatars().catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toHaveProperty('message', 'failed to list avatars: socket hang up');
        expect(error).toHaveProperty('statusCode', 0);
    });

    describe('cloneVoice', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clone-'));
            jest.spyOn(console, 'log').mockImplementation(() => undefined);
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
            jest.restoreAllMocks();
        });

        it('should upload the dataset as multipart form data', async () => {
            const audioDir = path.join(tmpDir, 'audio');
            fs.mkdirSync(audioDir);
            fs.writeFileSync(path.join(audioDir, 'a.wav'), 'RIFF');
            const annotationFile = path.join(tmpDir, 'annotation.list');
            fs.writeFileSync(annotationFile, 'a.wav|hello there\n');

            nock(apiUrl)
                .post('/v1/voice/clone')
                .matchHeader('content-type', /^multipart\/form-data; boundary=/)
                .reply(200, { data: { task_id: 'clone-1', status: 'PENDING' } });

            const client = new StudioApiClient({ apiUrl, apiToken });
            const accepted = await client.cloneVoice({ name: 'My Voice', audioDir, annotationFile, cleanData: true });

            expect(accepted).toEqual({ task_id: 'clone-1', status: 'PENDING' });
            expect(console.log).toHaveBeenCalledWith('Uploading 1 audio files for voice cloning...');
        });

        it('should refuse an empty audio directory before uploading', async () => {
            const client = new StudioApiClient({ apiUrl, apiToken });

            await expect(client.cloneVoice({
                name: 'My Voice',
                audioDir: tmpDir,
                annotationFile: path.join(tmpDir, 'annotation.list'),
                cleanData: false,
            })).rejects.toThrow(new ValidationError(`no audio files (.wav or .mp3) found in directory: ${tmpDir}`));
        });
    });
});
