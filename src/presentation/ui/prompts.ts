import readline from 'readline/promises';
import { describeAbortReason } from '../../application/TaskPoller';
import { CancellationError } from '../../domain/errors';

export interface PromptOptions {
    /** Aborting it rejects the pending question with CancellationError */
    signal?: AbortSignal;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

export function isInteractive(): boolean {
    return Boolean(process.stdin.isTTY);
}

/**
 * Asks one question and returns the trimmed answer. Ctrl+C while the prompt
 * owns the terminal cancels it the same way the process signal does.
 */
export async function ask(question: string, options: PromptOptions = {}): Promise<string> {
    const { signal } = options;
    if (signal?.aborted) {
        throw new CancellationError(describeAbortReason(signal));
    }

    const rl = readline.createInterface({
        input: options.input ?? process.stdin,
        output: options.output ?? process.stdout,
    });
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });
    rl.on('SIGINT', () => controller.abort('interrupted'));

    try {
        const answer = await rl.question(question, { signal: controller.signal });
        return answer.trim();
    } catch (error) {
        if (controller.signal.aborted) {
            throw new CancellationError(describeAbortReason(controller.signal));
        }
        throw error;
    } finally {
        signal?.removeEventListener('abort', forwardAbort);
        rl.close();
    }
}

export async function confirm(question: string, options: PromptOptions = {}): Promise<boolean> {
    const answer = await ask(`${question} (y/N): `, options);
    return ['y', 'yes'].includes(answer.toLowerCase());
}
