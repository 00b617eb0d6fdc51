import { Command } from 'commander';
import { requireValue } from '../../../application/inputValidation';
import { VoiceProfile } from '../../../domain/entities/Voice';
import { VoiceCloneEndpoint } from '../../../infrastructure/endpoints';
import { validateVoiceCloneInput } from '../../../infrastructure/files/MediaFiles';
import { createVoiceProfileTable, formatTimestamp } from '../../ui/TableWriter';
import { CliContext, CliRuntime, contextFor, printJson } from '../context';
import {
    JsonFlags,
    PollingFlags,
    addPollingOptions,
    confirmDeletion,
    reportTaskStatus,
    toRunOptions,
} from './shared';

type CloneFlags = PollingFlags & {
    name?: string;
    audioDir?: string;
    annotation?: string;
    cleanData?: boolean;
};

type DeleteFlags = { force?: boolean };

function printProfiles(ctx: CliContext, profiles: VoiceProfile[], options: JsonFlags, emptyMessage: string): void {
    if (options.json) {
        printJson(profiles);
        return;
    }
    if (profiles.length === 0) {
        console.log(emptyMessage);
        return;
    }

    const table = createVoiceProfileTable(ctx.out);
    for (const profile of profiles) {
        table.addRow([profile.id, profile.name, profile.description, (profile.languages ?? []).join(', ')]);
    }
    table.flush();
}

export function registerVoiceCommands(program: Command, runtime: CliRuntime): void {
    const voice = program
        .command('voice')
        .description('Manage voice profiles and clone voices');

    voice
        .command('premade')
        .description('List premade voice profiles')
        .option('-j, --json', 'Output in JSON format')
        .action(async (options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const profiles = await ctx.client.listPremadeVoiceProfiles({ signal: ctx.signal });
            printProfiles(ctx, profiles, options, 'No premade voice profiles found');
        });

    voice
        .command('list')
        .description('List your custom voice profiles')
        .option('-j, --json', 'Output in JSON format')
        .action(async (options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const profiles = await ctx.client.listVoiceProfiles({ signal: ctx.signal });
            printProfiles(ctx, profiles, options, 'No custom voice profiles found');
        });

    voice
        .command('view')
        .description('Show details of a voice profile')
        .argument('<profile-id>', 'Voice profile ID')
        .option('-j, --json', 'Output in JSON format')
        .action(async (profileId: string, options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const profile = await ctx.client.getVoiceProfile(profileId, { signal: ctx.signal });

            if (options.json) {
                printJson(profile);
                return;
            }

            console.log(`ID: ${profile.id}`);
            console.log(`Name: ${profile.name ?? ''}`);
            if (profile.description) console.log(`Description: ${profile.description}`);
            if (profile.status) console.log(`Status: ${profile.status}`);
            if (profile.languages && profile.languages.length > 0) console.log(`Languages: ${profile.languages.join(', ')}`);
            if (profile.created_at) console.log(`Created: ${formatTimestamp(profile.created_at)}`);
            if (profile.sample_clip) console.log(`Sample: ${profile.sample_clip}`);
        });

    addPollingOptions(
        voice
            .command('clone')
            .description('Clone a voice from a directory of audio samples and an annotation list')
            .option('--name <name>', 'Name for the new voice profile')
            .option('--audio-dir <dir>', 'Directory containing .wav or .mp3 samples')
            .option('--annotation <file>', "Annotation list with 'filename|transcription' lines")
            .option('--clean-data', 'Ask the service to denoise the samples before training')
    ).action(async (options: CloneFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        const name = requireValue(options.name, 'name', 'name');
        const audioDir = requireValue(options.audioDir, 'audio directory', 'audio-dir');
        const annotationFile = requireValue(options.annotation, 'annotation file', 'annotation');
        const runOptions = toRunOptions(ctx, options);

        await validateVoiceCloneInput(audioDir, annotationFile);

        const outcome = await ctx.generation.run(
            new VoiceCloneEndpoint(ctx.client),
            { name, audioDir, annotationFile, cleanData: options.cleanData ?? false },
            runOptions
        );
        console.log(`   Voice Profile ID: ${outcome.artifact.data}`);
    });

    voice
        .command('status')
        .description('Check the status of a voice cloning task')
        .argument('<task-id>', 'Task ID returned by voice clone')
        .action(async (taskId: string, _options: unknown, command: Command) => {
            const ctx = contextFor(command, runtime);
            await reportTaskStatus(ctx, new VoiceCloneEndpoint(ctx.client), taskId, {});
        });

    voice
        .command('delete')
        .description('Delete a custom voice profile')
        .argument('<profile-id>', 'Voice profile ID')
        .option('-f, --force', 'Skip confirmation prompt')
        .action(async (profileId: string, options: DeleteFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            if (!(await confirmDeletion('voice profile', profileId, options.force, ctx.signal))) {
                console.log('Deletion cancelled');
                return;
            }
            await ctx.client.deleteVoiceProfile(profileId, { signal: ctx.signal });
            console.log(`✅ Successfully deleted voice profile: ${profileId}`);
        });
}
