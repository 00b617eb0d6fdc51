import dotenv from 'dotenv';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { IOError, ValidationError, errorMessage } from '../domain/errors';

// Load environment variables
dotenv.config();

/**
 * Saved defaults for `studio interactive start --profile NAME`.
 */
export interface InteractiveProfile {
    avatarId?: string;
    model?: string;
    llmModel?: string;
    voiceProfileId?: string;
    instruction?: string;
    tools?: string;
}

/**
 * Effective CLI configuration: defaults, then the config file, then the
 * environment, then command-line flags.
 */
export interface Config {
    // API
    apiToken: string;
    apiUrl: string;

    // Defaults
    defaultModel: string;
    defaultVoice: string;
    defaultSavePath: string;
    pollIntervalSeconds: number;

    // Interactive sessions
    interactiveUrl: string;
    interactiveProfiles: Record<string, InteractiveProfile>;

    debug: boolean;
}

/**
 * Values given on the command line. They win over everything else.
 */
export interface ConfigOverrides {
    apiToken?: string;
    apiUrl?: string;
    debug?: boolean;
}

/**
 * On-disk shape of config.json.
 */
export interface ConfigFile {
    api_token?: string;
    api_url?: string;
    default_model?: string;
    default_voice?: string;
    default_save_path?: string;
    poll_interval?: number;
    interactive_url?: string;
    interactive_profiles?: Record<string, InteractiveProfileFile>;
}

export interface InteractiveProfileFile {
    avatar_id?: string;
    model?: string;
    llm_model?: string;
    voice_profile_id?: string;
    instruction?: string;
    tools?: string;
}

export const DEFAULT_CONFIG = {
    apiUrl: 'https://mirako.co',
    defaultModel: 'metis-2.5',
    defaultVoice: '',
    defaultSavePath: '.',
    pollIntervalSeconds: 2,
    interactiveUrl: 'https://interactive.mirako.ai/i',
} as const;

/**
 * Keys accepted by `studio config set/get`, mapped to their config.json field.
 */
export const CONFIG_KEYS = {
    'api-token': 'api_token',
    'api-url': 'api_url',
    'default-model': 'default_model',
    'default-voice': 'default_voice',
    'default-save-path': 'default_save_path',
    'poll-interval': 'poll_interval',
    'interactive-url': 'interactive_url',
} as const satisfies Record<string, keyof ConfigFile>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

export function isConfigKey(key: string): key is ConfigKey {
    return Object.prototype.hasOwnProperty.call(CONFIG_KEYS, key);
}

function getEnvVar(key: string): string | undefined {
    let value = process.env[key];
    if (value === undefined) {
        return undefined;
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
        value = value.substring(1, value.length - 1);
    }

    return value === '' ? undefined : value;
}

function getEnvVarNumber(key: string): number | undefined {
    const value = getEnvVar(key);
    if (value === undefined) {
        return undefined;
    }
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new ValidationError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

export function getConfigDir(): string {
    return getEnvVar('STUDIO_CONFIG_DIR') ?? path.join(os.homedir(), '.studio');
}

export function getConfigPath(): string {
    return path.join(getConfigDir(), 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
}

function parseProfiles(value: unknown): Record<string, InteractiveProfileFile> | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const profiles: Record<string, InteractiveProfileFile> = {};
    for (const [name, entry] of Object.entries(value)) {
        if (!isRecord(entry)) continue;
        profiles[name] = {
            avatar_id: readString(entry, 'avatar_id'),
            model: readString(entry, 'model'),
            llm_model: readString(entry, 'llm_model'),
            voice_profile_id: readString(entry, 'voice_profile_id'),
            instruction: readString(entry, 'instruction'),
            tools: readString(entry, 'tools'),
        };
    }
    return profiles;
}

function parseConfigFile(raw: unknown, filePath: string): ConfigFile {
    if (!isRecord(raw)) {
        throw new ValidationError(`invalid config file ${filePath}: expected a JSON object`);
    }
    const pollInterval = raw.poll_interval;
    return {
        api_token: readString(raw, 'api_token'),
        api_url: readString(raw, 'api_url'),
        default_model: readString(raw, 'default_model'),
        default_voice: readString(raw, 'default_voice'),
        default_save_path: readString(raw, 'default_save_path'),
        poll_interval: typeof pollInterval === 'number' ? pollInterval : undefined,
        interactive_url: readString(raw, 'interactive_url'),
        interactive_profiles: parseProfiles(raw.interactive_profiles),
    };
}

/**
 * Reads config.json. A missing file is an empty config.
 */
export function readConfigFile(filePath: string = getConfigPath()): ConfigFile {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        if (isRecord(error) && error.code === 'ENOENT') {
            return {};
        }
        throw new IOError(`failed to read config file: ${errorMessage(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new ValidationError(`invalid config file ${filePath}: ${errorMessage(error)}`);
    }
    return parseConfigFile(raw, filePath);
}

function writeConfigFile(file: ConfigFile, filePath: string = getConfigPath()): void {
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
        fs.writeFileSync(filePath, `${JSON.stringify(file, null, 2)}\n`, { mode: 0o600 });
    } catch (error) {
        throw new IOError(`failed to save configuration: ${errorMessage(error)}`, { cause: error });
    }
}

function toInteractiveProfiles(profiles: Record<string, InteractiveProfileFile> | undefined): Record<string, InteractiveProfile> {
    const result: Record<string, InteractiveProfile> = {};
    for (const [name, profile] of Object.entries(profiles ?? {})) {
        result[name.toLowerCase()] = {
            avatarId: profile.avatar_id,
            model: profile.model,
            llmModel: profile.llm_model,
            voiceProfileId: profile.voice_profile_id,
            instruction: profile.instruction,
            tools: profile.tools,
        };
    }
    return result;
}

/**
 * Loads the effective configuration.
 */
export function loadConfig(overrides: ConfigOverrides = {}): Config {
    const file = readConfigFile();

    return {
        // API
        apiToken: overrides.apiToken || getEnvVar('STUDIO_API_TOKEN') || file.api_token || '',
        apiUrl: overrides.apiUrl || getEnvVar('STUDIO_API_URL') || file.api_url || DEFAULT_CONFIG.apiUrl,

        // Defaults
        defaultModel: getEnvVar('STUDIO_DEFAULT_MODEL') || file.default_model || DEFAULT_CONFIG.defaultModel,
        defaultVoice: getEnvVar('STUDIO_DEFAULT_VOICE') || file.default_voice || DEFAULT_CONFIG.defaultVoice,
        defaultSavePath: getEnvVar('STUDIO_DEFAULT_SAVE_PATH') || file.default_save_path || DEFAULT_CONFIG.defaultSavePath,
        pollIntervalSeconds: getEnvVarNumber('STUDIO_POLL_INTERVAL') ?? file.poll_interval ?? DEFAULT_CONFIG.pollIntervalSeconds,

        // Interactive sessions
        interactiveUrl: file.interactive_url || DEFAULT_CONFIG.interactiveUrl,
        interactiveProfiles: toInteractiveProfiles(file.interactive_profiles),

        debug: overrides.debug ?? false,
    };
}

/**
 * Validates the loaded configuration. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!/^https?:\/\//.test(config.apiUrl)) {
        errors.push(`api-url must start with http:// or https://, got: ${config.apiUrl}`);
    }
    if (!(config.pollIntervalSeconds > 0)) {
        errors.push(`poll-interval must be a positive number of seconds, got: ${config.pollIntervalSeconds}`);
    }
    if (!/^https?:\/\//.test(config.interactiveUrl)) {
        errors.push(`interactive-url must start with http:// or https://, got: ${config.interactiveUrl}`);
    }

    return errors;
}

/**
 * Stores one value in config.json. Numbers are parsed for numeric keys.
 */
export function setConfigValue(key: ConfigKey, value: string): void {
    const file = readConfigFile();
    const field = CONFIG_KEYS[key];

    if (field === 'poll_interval') {
        const parsed = Number(value);
        if (!Number.isFinite(parsed) || parsed <= 0) {
            throw new ValidationError(`poll-interval must be a positive number of seconds, got: ${value}`);
        }
        file.poll_interval = parsed;
    } else if ((field === 'api_url' || field === 'interactive_url') && !/^https?:\/\//.test(value)) {
        throw new ValidationError(`${key} must start with http:// or https://, got: ${value}`);
    } else {
        file[field] = value;
    }

    writeConfigFile(file);
}

/**
 * Reads one effective value (after environment overrides) for display.
 */
export function getConfigValue(config: Config, key: ConfigKey): string {
    switch (key) {
        case 'api-token':
            return config.apiToken;
        case 'api-url':
            return config.apiUrl;
        case 'default-model':
            return config.defaultModel;
        case 'default-voice':
            return config.defaultVoice;
        case 'default-save-path':
            return config.defaultSavePath;
        case 'poll-interval':
            return String(config.pollIntervalSeconds);
        case 'interactive-url':
            return config.interactiveUrl;
    }
}

/**
 * Removes the stored API token, keeping every other setting.
 */
export function clearApiToken(): void {
    const file = readConfigFile();
    delete file.api_token;
    writeConfigFile(file);
}
