import { Command } from 'commander';
import { requireValue } from '../../../application/inputValidation';
import { VideoGenerateEndpoint } from '../../../infrastructure/endpoints';
import { readFileAsBase64 } from '../../../infrastructure/files/MediaFiles';
import { CliRuntime, contextFor } from '../context';
import {
    GenerationFlags,
    StatusFlags,
    addGenerationOptions,
    addStatusOptions,
    reportTaskStatus,
    toRunOptions,
} from './shared';

type GenerateFlags = GenerationFlags & { audio?: string; image?: string };

export function registerVideoCommands(program: Command, runtime: CliRuntime): void {
    const video = program
        .command('video')
        .description('Generate talking avatar videos');

    addGenerationOptions(
        video
            .command('generate')
            .description('Generate a talking avatar video from a face image and an audio track')
            .option('--audio <path>', 'Path to the audio file')
            .option('--image <path>', 'Path to the face image'),
        'video'
    ).action(async (options: GenerateFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        const audioPath = requireValue(options.audio, 'audio path', 'audio');
        const imagePath = requireValue(options.image, 'image path', 'image');
        const runOptions = toRunOptions(ctx, options);

        const audio = await readFileAsBase64(audioPath, 'audio');
        const image = await readFileAsBase64(imagePath, 'image');

        await ctx.generation.run(new VideoGenerateEndpoint(ctx.client), { audio, image }, runOptions);
    });

    addStatusOptions(
        video
            .command('status')
            .description('Check the status of a video generation task')
            .argument('<task-id>', 'Task ID returned by video generate')
    ).action(async (taskId: string, options: StatusFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        await reportTaskStatus(ctx, new VideoGenerateEndpoint(ctx.client), taskId, options);
    });
}
