/**
 * IProgressIndicator - Port for the single-line progress display.
 * Implementations: TerminalSpinner
 */
export interface IProgressIndicator {
    /** Redraws the line with the next frame and the given status text */
    render(status: string): void;
    /** Erases the progress line */
    clear(): void;
}
