import { Command } from 'commander';
import { CONFIG_KEYS, ConfigKey, getConfigPath, getConfigValue, isConfigKey, setConfigValue } from '../../../config';
import { ValidationError } from '../../../domain/errors';
import { CliRuntime, contextFor } from '../context';

/**
 * Shows only the edges of a token.
 */
export function formatToken(token: string): string {
    if (!token) {
        return '(not set)';
    }
    if (token.length <= 8) {
        return '***';
    }
    return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

function requireConfigKey(key: string): ConfigKey {
    if (!isConfigKey(key)) {
        throw new ValidationError(`unknown configuration key: ${key}. Valid keys: ${Object.keys(CONFIG_KEYS).join(', ')}`);
    }
    return key;
}

export function registerConfigCommands(program: Command, runtime: CliRuntime): void {
    const config = program
        .command('config')
        .description('Read and change CLI configuration');

    config
        .command('set')
        .description('Set a configuration value')
        .argument('<key>', `One of: ${Object.keys(CONFIG_KEYS).join(', ')}`)
        .argument('<value>', 'New value')
        .action((key: string, value: string) => {
            const configKey = requireConfigKey(key);
            setConfigValue(configKey, value);
            console.log(`✅ Set ${configKey} = ${configKey === 'api-token' ? formatToken(value) : value}`);
        });

    config
        .command('get')
        .description('Print a configuration value')
        .argument('<key>', 'Configuration key')
        .action((key: string, _options: unknown, command: Command) => {
            const configKey = requireConfigKey(key);
            const value = getConfigValue(contextFor(command, runtime).config, configKey);

            if (!value) {
                console.log('(not set)');
            } else if (configKey === 'api-token') {
                // Never print the stored token
                console.log('***');
            } else {
                console.log(value);
            }
        });

    config
        .command('list')
        .description('Print the effective configuration')
        .action((_options: unknown, command: Command) => {
            const effective = contextFor(command, runtime).config;

            console.log('Configuration:');
            for (const key of Object.keys(CONFIG_KEYS)) {
                const configKey = requireConfigKey(key);
                const value = getConfigValue(effective, configKey);
                console.log(`  ${configKey}: ${configKey === 'api-token' ? formatToken(value) : value || '(not set)'}`);
            }

            const profiles = Object.keys(effective.interactiveProfiles);
            if (profiles.length > 0) {
                console.log(`  interactive-profiles: ${profiles.join(', ')}`);
            }
            console.log(`\nConfig Path: ${getConfigPath()}`);
        });
}
