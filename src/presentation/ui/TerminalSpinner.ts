import { IProgressIndicator } from '../../domain/ports/IProgressIndicator';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

/** Carriage return plus ANSI erase-to-end-of-line */
export const CLEAR_LINE = '\r\x1b[K';

/**
 * Minimal writable surface, satisfied by process.stdout.
 */
export interface LineWriter {
    write(chunk: string): boolean;
}

/**
 * Spinner that keeps rewriting one terminal line.
 */
export class TerminalSpinner implements IProgressIndicator {
    private frameIndex = 0;

    constructor(
        private readonly out: LineWriter = process.stdout,
        private readonly prefix: string = 'Status: '
    ) { }

    render(status: string): void {
        const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
        this.frameIndex++;
        this.out.write(`${CLEAR_LINE}${frame} ${this.prefix}${status}`);
    }

    clear(): void {
        this.out.write(CLEAR_LINE);
    }
}
