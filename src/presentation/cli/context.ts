import { Command } from 'commander';
import { GenerationService } from '../../application/services/GenerationService';
import { Config, loadConfig, validateConfig } from '../../config';
import { AuthenticationError, ValidationError } from '../../domain/errors';
import { IProgressIndicator } from '../../domain/ports/IProgressIndicator';
import { IStudioApiClient } from '../../domain/ports/IStudioApiClient';
import { StudioApiClient, StudioApiClientOptions } from '../../infrastructure/api/StudioApiClient';
import { ArtifactMaterializer } from '../../infrastructure/storage/ArtifactMaterializer';
import { LineWriter, TerminalSpinner } from '../ui/TerminalSpinner';

/**
 * Process-level collaborators. Tests swap the client and the output.
 */
export interface CliRuntime {
    signal: AbortSignal;
    createClient?: (options: StudioApiClientOptions) => IStudioApiClient;
    createIndicator?: () => IProgressIndicator;
    materializer?: ArtifactMaterializer;
    out?: LineWriter;
}

export type GlobalOptions = {
    apiToken?: string;
    apiUrl?: string;
    debug?: boolean;
};

/**
 * Per-command view of configuration and services. Everything is created on
 * first use so commands that never call the API never need a token.
 */
export class CliContext {
    private cachedConfig?: Config;
    private cachedClient?: IStudioApiClient;
    private cachedGeneration?: GenerationService;

    constructor(
        private readonly runtime: CliRuntime,
        private readonly globals: GlobalOptions
    ) { }

    get signal(): AbortSignal {
        return this.runtime.signal;
    }

    get out(): LineWriter {
        return this.runtime.out ?? process.stdout;
    }

    get config(): Config {
        if (!this.cachedConfig) {
            const config = loadConfig({
                apiToken: this.globals.apiToken,
                apiUrl: this.globals.apiUrl,
                debug: this.globals.debug,
            });
            const errors = validateConfig(config);
            if (errors.length > 0) {
                throw new ValidationError(`invalid configuration:\n  ${errors.join('\n  ')}`);
            }
            this.cachedConfig = config;
        }
        return this.cachedConfig;
    }

    get client(): IStudioApiClient {
        if (!this.cachedClient) {
            const { apiToken, apiUrl, debug } = this.config;
            if (!apiToken) {
                throw new AuthenticationError();
            }
            const factory = this.runtime.createClient ?? ((options: StudioApiClientOptions) => new StudioApiClient(options));
            this.cachedClient = factory({ apiUrl, apiToken, debug });
        }
        return this.cachedClient;
    }

    get generation(): GenerationService {
        if (!this.cachedGeneration) {
            this.cachedGeneration = new GenerationService(
                this.runtime.materializer ?? new ArtifactMaterializer(),
                this.runtime.createIndicator ?? (() => new TerminalSpinner())
            );
        }
        return this.cachedGeneration;
    }
}

export function contextFor(command: Command, runtime: CliRuntime): CliContext {
    return new CliContext(runtime, command.optsWithGlobals<GlobalOptions>());
}

export function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}
