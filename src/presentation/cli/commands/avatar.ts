import { Command } from 'commander';
import { parseSeed, requireValue, validatePrompt } from '../../../application/inputValidation';
import { AvatarBuildEndpoint, AvatarGenerateEndpoint } from '../../../infrastructure/endpoints';
import { readFileAsBase64 } from '../../../infrastructure/files/MediaFiles';
import { createAvatarTable, formatTimestamp } from '../../ui/TableWriter';
import { CliRuntime, contextFor, printJson } from '../context';
import {
    GenerationFlags,
    JsonFlags,
    PollingFlags,
    StatusFlags,
    addGenerationOptions,
    addPollingOptions,
    addStatusOptions,
    confirmDeletion,
    reportTaskStatus,
    toRunOptions,
} from './shared';

/** Builds take minutes, there is no point polling every couple of seconds */
const BUILD_POLL_INTERVAL_SECONDS = 10;

type GenerateFlags = GenerationFlags & { prompt?: string; seed?: string };
type BuildFlags = PollingFlags & { name?: string; image?: string };
type DeleteFlags = { force?: boolean };

export function registerAvatarCommands(program: Command, runtime: CliRuntime): void {
    const avatar = program
        .command('avatar')
        .description('Manage avatars: list, view, generate, build and delete');

    avatar
        .command('list')
        .description('List your avatars')
        .option('-j, --json', 'Output in JSON format')
        .action(async (options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const avatars = await ctx.client.listAvatars({ signal: ctx.signal });

            if (options.json) {
                printJson(avatars);
                return;
            }
            if (avatars.length === 0) {
                console.log('No avatars found');
                return;
            }

            const table = createAvatarTable(ctx.out);
            for (const item of avatars) {
                table.addRow([item.name, item.id, item.status, formatTimestamp(item.created_at)]);
            }
            table.flush();
        });

    avatar
        .command('view')
        .description('Show details of an avatar')
        .argument('<avatar-id>', 'Avatar ID')
        .option('-j, --json', 'Output in JSON format')
        .action(async (avatarId: string, options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const item = await ctx.client.getAvatar(avatarId, { signal: ctx.signal });

            if (options.json) {
                printJson(item);
                return;
            }

            console.log(`ID: ${item.id}`);
            console.log(`Name: ${item.name}`);
            console.log(`Status: ${item.status}`);
            console.log(`Created: ${formatTimestamp(item.created_at)}`);
            console.log(`User ID: ${item.user_id}`);

            if (item.themes && item.themes.length > 0) {
                console.log('\nThemes:');
                for (const theme of item.themes) {
                    console.log(`  - ${theme.name}:`);
                    if (theme.key_image) console.log(`    Key Image: ${theme.key_image}`);
                    if (theme.live_video) console.log(`    Live Video: ${theme.live_video}`);
                }
            }
        });

    addGenerationOptions(
        avatar
            .command('generate')
            .description('Generate an avatar image from a text prompt')
            .option('-p, --prompt <text>', 'Prompt for avatar generation (max 1000 characters)')
            .option('--seed <number>', 'Seed for reproducible generation'),
        'avatar'
    ).action(async (options: GenerateFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        const prompt = validatePrompt(options.prompt);
        const seed = options.seed !== undefined ? parseSeed(options.seed) : undefined;
        const runOptions = toRunOptions(ctx, options);

        await ctx.generation.run(new AvatarGenerateEndpoint(ctx.client), { prompt, seed }, runOptions);
    });

    addPollingOptions(
        avatar
            .command('build')
            .description('Build a live avatar from a base image')
            .option('--name <name>', 'Name for the new avatar')
            .option('--image <path>', 'Path to the base image file')
    ).action(async (options: BuildFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        const name = requireValue(options.name, 'name', 'name');
        const imagePath = requireValue(options.image, 'image path', 'image');
        const runOptions = toRunOptions(ctx, options, BUILD_POLL_INTERVAL_SECONDS);

        const image = await readFileAsBase64(imagePath, 'image');
        console.log('💡 The build continues on the server if you quit (Ctrl+C). Check it later with:');
        console.log('   studio avatar list');

        const outcome = await ctx.generation.run(new AvatarBuildEndpoint(ctx.client), { name, image }, runOptions);
        console.log(`   Avatar ID: ${outcome.artifact.data}`);
        console.log('\n💡 Tip: View details with:');
        console.log(`   studio avatar view ${outcome.artifact.data}`);
    });

    addStatusOptions(
        avatar
            .command('status')
            .description('Check the status of an avatar generation task')
            .argument('<task-id>', 'Task ID returned by avatar generate')
    ).action(async (taskId: string, options: StatusFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        await reportTaskStatus(ctx, new AvatarGenerateEndpoint(ctx.client), taskId, options);
    });

    avatar
        .command('delete')
        .description('Delete an avatar')
        .argument('<avatar-id>', 'Avatar ID')
        .option('-f, --force', 'Skip confirmation prompt')
        .action(async (avatarId: string, options: DeleteFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            if (!(await confirmDeletion('avatar', avatarId, options.force, ctx.signal))) {
                console.log('Deletion cancelled');
                return;
            }
            await ctx.client.deleteAvatar(avatarId, { signal: ctx.signal });
            console.log(`✅ Successfully deleted avatar: ${avatarId}`);
        });
}
