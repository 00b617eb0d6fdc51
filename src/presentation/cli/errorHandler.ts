import { CancellationError, TransportError } from '../../domain/errors';
import { LineWriter } from '../ui/TerminalSpinner';

export interface ErrorHandlerOptions {
    debug?: boolean;
    stderr?: LineWriter;
}

/**
 * The one line shown to the user for a failed command.
 */
export function describeError(error: unknown): string {
    if (error instanceof TransportError) {
        return error.getUserFriendlyMessage();
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Reports a command failure on stderr and returns the process exit code.
 */
export function handleCliError(error: unknown, options: ErrorHandlerOptions = {}): number {
    const stderr = options.stderr ?? process.stderr;

    stderr.write(`❌ ${describeError(error)}\n`);

    if (error instanceof CancellationError && error.reason === 'interrupted') {
        stderr.write('   Jobs already submitted keep running on the server.\n');
    }
    if (options.debug && error instanceof Error && error.stack) {
        stderr.write(`${error.stack}\n`);
    }

    return 1;
}
