import { PassThrough } from 'stream';
import { CancellationError } from '../../../src/domain/errors';
import { ask, confirm } from '../../../src/presentation/ui/prompts';

describe('prompts', () => {
    let input: PassThrough;
    let output: PassThrough;

    beforeEach(() => {
        input = new PassThrough();
        output = new PassThrough();
    });

    it('should return the trimmed answer', async () => {
        const pending = ask('Name: ', { input, output });
        input.write('  Nova  \n');

        await expect(pending).resolves.toBe('Nova');
    });

    it('should read yes as confirmation', async () => {
        const pending = confirm('Delete avatar av-1?', { input, output });
        input.write('yes\n');

        await expect(pending).resolves.toBe(true);
    });

    it('should treat an empty answer as no', async () => {
        const pending = confirm('Delete avatar av-1?', { input, output });
        input.write('\n');

        await expect(pending).resolves.toBe(false);
    });

    it('should cancel a pending question when the signal aborts', async () => {
        const controller = new AbortController();
        const pending = ask('API Token: ', { signal: controller.signal, input, output });

        controller.abort();

        await expect(pending).rejects.toThrow(new CancellationError('interrupted'));
    });

    it('should not ask once the signal has already aborted', async () => {
        const controller = new AbortController();
        controller.abort('shutting down');

        await expect(ask('API Token: ', { signal: controller.signal, input, output }))
            .rejects.toThrow('operation cancelled: shutting down');
        expect(output.read()).toBeNull();
    });
});
