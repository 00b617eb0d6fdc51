import { Command } from 'commander';
import { getConfigPath, setConfigValue, clearApiToken } from '../../../config';
import { ValidationError } from '../../../domain/errors';
import { ask, isInteractive } from '../../ui/prompts';
import { CliRuntime, contextFor } from '../context';

type LoginFlags = { token?: string };

export function registerAuthCommands(program: Command, runtime: CliRuntime): void {
    const auth = program
        .command('auth')
        .description('Login, logout and check authentication status');

    auth
        .command('login')
        .description('Store an API token')
        .option('--token <token>', 'API token (prompted for when omitted)')
        .action(async (options: LoginFlags) => {
            let token = options.token?.trim();
            if (!token) {
                if (!isInteractive()) {
                    throw new ValidationError('API token is required. Use --token flag');
                }
                token = await ask('API Token: ', { signal: runtime.signal });
            }
            if (!token) {
                throw new ValidationError('API token cannot be empty');
            }

            setConfigValue('api-token', token);
            console.log('✅ Successfully authenticated!');
            console.log(`   Config Path: ${getConfigPath()}`);
        });

    auth
        .command('logout')
        .description('Remove the stored API token')
        .action(() => {
            clearApiToken();
            console.log('✅ Successfully logged out!');
        });

    auth
        .command('status')
        .description('Check whether an API token is configured')
        .action((_options: unknown, command: Command) => {
            const ctx = contextFor(command, runtime);
            const config = ctx.config;

            if (config.apiToken) {
                console.log('✅ Authenticated');
                console.log(`   API URL: ${config.apiUrl}`);
                console.log(`   Config Path: ${getConfigPath()}`);
            } else {
                console.log('❌ Not authenticated');
                console.log("   Run 'studio auth login' to authenticate");
            }
        });
}
