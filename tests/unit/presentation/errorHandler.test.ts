import { CancellationError, TransportError, ValidationError } from '../../../src/domain/errors';
import { describeError, handleCliError } from '../../../src/presentation/cli/errorHandler';
import { RecordingWriter } from '../helpers/fakes';

describe('errorHandler', () => {
    it('should print the friendly message for HTTP failures', () => {
        const stderr = new RecordingWriter();
        const error = new TransportError('API error (401): bad token', 401, 'list avatars', 'bad token');

        const code = handleCliError(error, { stderr });

        expect(code).toBe(1);
        expect(stderr.text).toBe("❌ Authentication failed. Please run 'studio auth login' to authenticate\n");
    });

    it('should use the server detail when no status-specific message applies', () => {
        expect(describeError(new TransportError('API error (400): seed out of range', 400, 'generate image', 'seed out of range')))
            .toBe('seed out of range');
        expect(describeError(new TransportError('failed to list avatars: socket hang up', 0, 'list avatars')))
            .toBe('failed to list avatars: socket hang up');
    });

    it('should explain that interrupted jobs keep running', () => {
        const stderr = new RecordingWriter();

        handleCliError(new CancellationError('interrupted'), { stderr });

        expect(stderr.chunks).toEqual([
            '❌ operation cancelled: interrupted\n',
            '   Jobs already submitted keep running on the server.\n',
        ]);
    });

    it('should print the stack trace only in debug mode', () => {
        const quiet = new RecordingWriter();
        const verbose = new RecordingWriter();
        const error = new ValidationError('prompt is required. Use --prompt flag');

        handleCliError(error, { stderr: quiet });
        handleCliError(error, { stderr: verbose, debug: true });

        expect(quiet.chunks).toHaveLength(1);
        expect(verbose.chunks).toHaveLength(2);
        expect(verbose.chunks[1]).toBe(`${error.stack ?? ''}\n`);
    });

    it('should describe non-Error values', () => {
        expect(describeError('plain failure')).toBe('plain failure');
    });
});
