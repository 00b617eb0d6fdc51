#!/usr/bin/env node
import { handleCliError } from './presentation/cli/errorHandler';
import { createProgram } from './presentation/cli/program';

async function main(argv: string[]): Promise<number> {
    // Ctrl+C cancels the running command; remote jobs keep running server-side
    const controller = new AbortController();
    const onSigint = (): void => {
        controller.abort();
    };
    process.once('SIGINT', onSigint);

    const program = createProgram({ signal: controller.signal });
    try {
        await program.parseAsync(argv);
        return 0;
    } catch (error) {
        return handleCliError(error, { debug: program.opts().debug === true });
    } finally {
        process.removeListener('SIGINT', onSigint);
    }
}

main(process.argv)
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
