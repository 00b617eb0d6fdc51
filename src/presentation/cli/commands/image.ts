import { Command } from 'commander';
import {
    parseAspectRatio,
    parseLabeledImage,
    parseSeed,
    validatePrompt,
    validateReferenceImageCount,
} from '../../../application/inputValidation';
import { GenerateImageRequest, LabeledImage } from '../../../domain/entities/GenerationTask';
import { ImageGenerateEndpoint } from '../../../infrastructure/endpoints';
import { readFileAsBase64 } from '../../../infrastructure/files/MediaFiles';
import { CliRuntime, contextFor } from '../context';
import {
    GenerationFlags,
    StatusFlags,
    addGenerationOptions,
    addStatusOptions,
    collect,
    reportTaskStatus,
    toRunOptions,
} from './shared';

type GenerateFlags = GenerationFlags & {
    prompt?: string;
    aspectRatio: string;
    seed?: string;
    image: string[];
    labeledImage: string[];
};

export function registerImageCommands(program: Command, runtime: CliRuntime): void {
    const image = program
        .command('image')
        .description('Generate images from text prompts and reference images');

    addGenerationOptions(
        image
            .command('generate')
            .description('Generate an image')
            .option('-p, --prompt <text>', 'Prompt for image generation (max 1000 characters)')
            .option('-a, --aspect-ratio <ratio>', 'Aspect ratio: 1:1, 16:9, 2:3, 3:2, 3:4, 4:3, 9:16', '16:9')
            .option('--seed <number>', 'Seed for reproducible generation')
            .option('--image <path>', 'Reference image (repeatable)', collect, [])
            .option('--labeled-image <label=path>', 'Labeled reference image (repeatable)', collect, []),
        'image'
    ).action(async (options: GenerateFlags, command: Command) => {
        const ctx = contextFor(command, runtime);

        const prompt = validatePrompt(options.prompt);
        const aspectRatio = parseAspectRatio(options.aspectRatio);
        const seed = options.seed !== undefined ? parseSeed(options.seed) : undefined;
        const labeled = options.labeledImage.map(parseLabeledImage);
        validateReferenceImageCount(options.image, labeled);
        const runOptions = toRunOptions(ctx, options);

        const request: GenerateImageRequest = { prompt, aspect_ratio: aspectRatio };
        if (seed !== undefined) {
            request.seed = seed;
        }
        if (options.image.length > 0) {
            request.images = await Promise.all(options.image.map((file) => readFileAsBase64(file, 'image')));
        }
        if (labeled.length > 0) {
            request.labeled_images = await Promise.all(labeled.map(async (entry): Promise<LabeledImage> => ({
                label: entry.label,
                image: await readFileAsBase64(entry.path, 'image'),
            })));
        }

        await ctx.generation.run(new ImageGenerateEndpoint(ctx.client), request, runOptions);
    });

    addStatusOptions(
        image
            .command('status')
            .description('Check the status of an image generation task')
            .argument('<task-id>', 'Task ID returned by image generate')
    ).action(async (taskId: string, options: StatusFlags, command: Command) => {
        const ctx = contextFor(command, runtime);
        await reportTaskStatus(ctx, new ImageGenerateEndpoint(ctx.client), taskId, options);
    });
}
