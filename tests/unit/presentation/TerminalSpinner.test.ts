import { CLEAR_LINE, SPINNER_FRAMES, TerminalSpinner } from '../../../src/presentation/ui/TerminalSpinner';
import { RecordingWriter } from '../helpers/fakes';

describe('TerminalSpinner', () => {
    it('should rewrite one line with the next frame and the status', () => {
        const out = new RecordingWriter();
        const spinner = new TerminalSpinner(out);

        spinner.render('PENDING');
        spinner.render('PROCESSING');

        expect(out.chunks).toEqual([
            `${CLEAR_LINE}${SPINNER_FRAMES[0]} Status: PENDING`,
            `${CLEAR_LINE}${SPINNER_FRAMES[1]} Status: PROCESSING`,
        ]);
    });

    it('should wrap around the frame list', () => {
        const out = new RecordingWriter();
        const spinner = new TerminalSpinner(out, '');

        for (let i = 0; i <= SPINNER_FRAMES.length; i++) {
            spinner.render('x');
        }

        expect(out.chunks[SPINNER_FRAMES.length]).toBe(`${CLEAR_LINE}${SPINNER_FRAMES[0]} x`);
    });

    it('should erase the line on clear', () => {
        const out = new RecordingWriter();

        new TerminalSpinner(out).clear();

        expect(out.text).toBe(CLEAR_LINE);
    });
});
