import { Command } from 'commander';
import { VERSION } from '../../version';
import { registerAuthCommands } from './commands/auth';
import { registerAvatarCommands } from './commands/avatar';
import { registerConfigCommands } from './commands/config';
import { registerImageCommands } from './commands/image';
import { registerInteractiveCommands } from './commands/interactive';
import { registerSpeechCommands } from './commands/speech';
import { registerVideoCommands } from './commands/video';
import { registerVoiceCommands } from './commands/voice';
import { CliRuntime } from './context';

/**
 * Builds the `studio` command tree.
 */
export function createProgram(runtime: CliRuntime): Command {
    const program = new Command();

    program
        .name('studio')
        .description('Command line client for avatar, image, video and voice generation')
        .version(VERSION, '--version', 'Print the version number')
        .option('--api-token <token>', 'API token (overrides config and STUDIO_API_TOKEN)')
        .option('--api-url <url>', 'API base URL (overrides config and STUDIO_API_URL)')
        .option('--debug', 'Log HTTP traffic and print stack traces on errors')
        .showHelpAfterError();

    registerAuthCommands(program, runtime);
    registerConfigCommands(program, runtime);
    registerAvatarCommands(program, runtime);
    registerImageCommands(program, runtime);
    registerVideoCommands(program, runtime);
    registerSpeechCommands(program, runtime);
    registerVoiceCommands(program, runtime);
    registerInteractiveCommands(program, runtime);

    program
        .command('version')
        .description('Print the version number')
        .action(() => {
            console.log(`studio version ${VERSION}`);
        });

    return program;
}
