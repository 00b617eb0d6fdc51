import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    DEFAULT_CONFIG,
    clearApiToken,
    getConfigPath,
    getConfigValue,
    isConfigKey,
    loadConfig,
    readConfigFile,
    setConfigValue,
    validateConfig,
} from '../../src/config/index';
import { ValidationError } from '../../src/domain/errors';

describe('ConfigLoader', () => {
    const originalEnv = process.env;
    let configDir: string;

    beforeEach(() => {
        configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'studio-config-'));
        process.env = { ...originalEnv };
        for (const key of Object.keys(process.env)) {
            if (key.startsWith('STUDIO_')) delete process.env[key];
        }
        process.env.STUDIO_CONFIG_DIR = configDir;
    });

    afterEach(() => {
        fs.rmSync(configDir, { recursive: true, force: true });
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    function writeConfig(content: unknown): void {
        fs.writeFileSync(path.join(configDir, 'config.json'), JSON.stringify(content));
    }

    it('should fall back to defaults without a config file', () => {
        const config = loadConfig();

        expect(config).toEqual({
            apiToken: '',
            apiUrl: DEFAULT_CONFIG.apiUrl,
            defaultModel: DEFAULT_CONFIG.defaultModel,
            defaultVoice: '',
            defaultSavePath: '.',
            pollIntervalSeconds: 2,
            interactiveUrl: DEFAULT_CONFIG.interactiveUrl,
            interactiveProfiles: {},
            debug: false,
        });
        expect(validateConfig(config)).toEqual([]);
    });

    it('should apply flags over environment over file', () => {
        writeConfig({ api_token: 'file-token', api_url: 'https://file.example.test', default_voice: 'file-voice' });
        process.env.STUDIO_API_TOKEN = 'env-token';
        process.env.STUDIO_API_URL = 'https://env.example.test';

        const config = loadConfig({ apiUrl: 'https://flag.example.test' });

        expect(config.apiToken).toBe('env-token');
        expect(config.apiUrl).toBe('https://flag.example.test');
        expect(config.defaultVoice).toBe('file-voice');
    });

    it('should strip quotes and whitespace from environment variables', () => {
        process.env.STUDIO_API_TOKEN = '  "test-secret"  ';
        process.env.STUDIO_DEFAULT_MODEL = "'custom-model'";

        const config = loadConfig();

        expect(config.apiToken).toBe('test-secret');
        expect(config.defaultModel).toBe('custom-model');
    });

    it('should reject a non-numeric poll interval from the environment', () => {
        process.env.STUDIO_POLL_INTERVAL = 'soon';

        expect(() => loadConfig()).toThrow('Environment variable STUDIO_POLL_INTERVAL must be a number, got: soon');
    });

    it('should report invalid values', () => {
        writeConfig({ api_url: 'ftp://example.test', poll_interval: 0 });

        expect(validateConfig(loadConfig())).toEqual([
            'api-url must start with http:// or https://, got: ftp://example.test',
            'poll-interval must be a positive number of seconds, got: 0',
        ]);
    });

    it('should load interactive profiles under lower-case names', () => {
        writeConfig({
            interactive_profiles: {
                Support: { avatar_id: 'av-1', llm_model: 'small-model', instruction: 'Be brief.' },
            },
        });

        expect(loadConfig().interactiveProfiles).toEqual({
            support: {
                avatarId: 'av-1',
                model: undefined,
                llmModel: 'small-model',
                voiceProfileId: undefined,
                instruction: 'Be brief.',
                tools: undefined,
            },
        });
    });

    it('should reject a config file that is not valid JSON', () => {
        fs.writeFileSync(path.join(configDir, 'config.json'), '{ not json');

        expect(() => readConfigFile()).toThrow(ValidationError);
    });

    describe('setConfigValue', () => {
        it('should persist values and keep the file private', () => {
            setConfigValue('default-voice', 'vp-1');
            setConfigValue('poll-interval', '5');

            expect(readConfigFile()).toEqual(expect.objectContaining({ default_voice: 'vp-1', poll_interval: 5 }));
            expect(fs.statSync(getConfigPath()).mode & 0o777).toBe(0o600);

            const config = loadConfig();
            expect(getConfigValue(config, 'poll-interval')).toBe('5');
            expect(getConfigValue(config, 'default-voice')).toBe('vp-1');
        });

        it('should validate numeric and URL keys', () => {
            expect(() => setConfigValue('poll-interval', '-1'))
                .toThrow('poll-interval must be a positive number of seconds, got: -1');
            expect(() => setConfigValue('api-url', 'example.test'))
                .toThrow('api-url must start with http:// or https://, got: example.test');
            expect(fs.existsSync(getConfigPath())).toBe(false);
        });
    });

    it('should clear only the API token on logout', () => {
        writeConfig({ api_token: 'test-secret', default_model: 'm-1' });

        clearApiToken();

        const file = readConfigFile();
        expect(file.api_token).toBeUndefined();
        expect(file.default_model).toBe('m-1');
    });

    it('should recognise the settable keys', () => {
        expect(isConfigKey('api-token')).toBe(true);
        expect(isConfigKey('interactive-profiles')).toBe(false);
    });
});
