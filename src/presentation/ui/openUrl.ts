import { spawn } from 'child_process';

function openCommand(url: string): { command: string; args: string[] } {
    switch (process.platform) {
        case 'darwin':
            return { command: 'open', args: [url] };
        case 'win32':
            return { command: 'cmd', args: ['/c', 'start', '""', url] };
        default:
            return { command: 'xdg-open', args: [url] };
    }
}

/**
 * Opens the URL in the default browser without waiting for it.
 * Resolves false when no opener could be started.
 */
export function openUrl(url: string): Promise<boolean> {
    return new Promise((resolve) => {
        const { command, args } = openCommand(url);
        const child = spawn(command, args, { detached: true, stdio: 'ignore' });

        child.once('error', (err) => {
            console.error(`[Browser] Could not open ${url}: ${err.message}`);
            resolve(false);
        });
        child.once('spawn', () => {
            child.unref();
            resolve(true);
        });
    });
}
