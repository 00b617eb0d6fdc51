import { Command } from 'commander';
import { parsePositiveInteger } from '../../../application/inputValidation';
import { GenerationRunOptions } from '../../../application/services/GenerationService';
import { TASK_KIND_LABELS } from '../../../domain/entities/Task';
import { ValidationError } from '../../../domain/errors';
import { ITaskEndpoint } from '../../../domain/ports/ITaskEndpoint';
import { defaultOutputPath, formatFileTimestamp } from '../../../infrastructure/storage/ArtifactMaterializer';
import { ask, confirm, isInteractive } from '../../ui/prompts';
import { CliContext } from '../context';

export type GenerationFlags = {
    output?: string;
    save: boolean;
    pollInterval?: string;
    timeout?: string;
};

export type PollingFlags = Omit<GenerationFlags, 'output' | 'save'>;

export type StatusFlags = {
    save?: boolean;
    output?: string;
};

export type JsonFlags = {
    json?: boolean;
};

/**
 * Repeatable option accumulator.
 */
export function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export function addPollingOptions(command: Command): Command {
    return command
        .option('-i, --poll-interval <seconds>', 'Polling interval in seconds for checking status')
        .option('--timeout <seconds>', 'Give up waiting after this many seconds (the job keeps running server-side)');
}

export function addGenerationOptions(command: Command, noun: string): Command {
    return addPollingOptions(command
        .option('-o, --output <path>', `Output file path for the generated ${noun}`)
        .option('-n, --no-save', `Skip saving the ${noun} to disk`));
}

/**
 * Resolves flag values against configuration defaults.
 */
export function toRunOptions(
    ctx: CliContext,
    flags: PollingFlags & Partial<Pick<GenerationFlags, 'output' | 'save'>>,
    defaultPollSeconds?: number
): GenerationRunOptions {
    const pollSeconds = flags.pollInterval !== undefined
        ? parsePositiveInteger(flags.pollInterval, 'poll-interval')
        : defaultPollSeconds ?? ctx.config.pollIntervalSeconds;

    return {
        pollIntervalMs: pollSeconds * 1000,
        maxWaitMs: flags.timeout !== undefined ? parsePositiveInteger(flags.timeout, 'timeout') * 1000 : undefined,
        skipSave: flags.save === false,
        outputPath: flags.output,
        saveDir: ctx.config.defaultSavePath,
        signal: ctx.signal,
    };
}

export function addStatusOptions(command: Command): Command {
    return command
        .option('-s, --save', 'Save the result without prompting')
        .option('-o, --output <path>', 'Save the result to this path');
}

/**
 * One status fetch for an existing task. A finished media result is saved on
 * request, or after asking when a terminal is attached.
 */
export async function reportTaskStatus<TParams>(
    ctx: CliContext,
    endpoint: ITaskEndpoint<TParams>,
    taskId: string,
    flags: StatusFlags
): Promise<void> {
    const status = await ctx.generation.checkStatus(endpoint, taskId, ctx.signal);

    console.log(`Task ID: ${taskId}`);
    console.log(`Status: ${status.label}`);

    if (status.state !== 'completed' || !status.payload) {
        console.log('⏳ Task is still in progress. Check again later.');
        return;
    }

    const payload = status.payload;
    console.log(`✅ ${TASK_KIND_LABELS[endpoint.kind]} completed!`);

    const profile = endpoint.mediaProfile;
    if (!profile || payload.kind === 'identifier') {
        console.log(`   ID: ${payload.data}`);
        return;
    }

    const saveDir = ctx.config.defaultSavePath;
    let outputPath = flags.output;

    if (!flags.save && !outputPath) {
        if (!isInteractive()) {
            console.log('Use --save or --output to save the result.');
            return;
        }
        const suggested = defaultOutputPath(profile, saveDir, formatFileTimestamp(new Date()));
        const answer = await ask(`Enter save path [${suggested}] (or 'n' to skip): `, { signal: ctx.signal });
        if (['n', 'no'].includes(answer.toLowerCase())) {
            console.log(`${profile.noun} not saved.`);
            return;
        }
        outputPath = answer || suggested;
    }

    await ctx.generation.save(payload, profile, { outputPath, saveDir, signal: ctx.signal });
}

/**
 * Asks before deleting. Without a terminal the caller must pass --force.
 */
export async function confirmDeletion(noun: string, id: string, force?: boolean, signal?: AbortSignal): Promise<boolean> {
    if (force) {
        return true;
    }
    if (!isInteractive()) {
        throw new ValidationError(`refusing to delete ${noun} ${id} without confirmation. Use --force flag`);
    }
    return confirm(`Are you sure you want to delete ${noun} ${id}?`, { signal });
}
