import { TableWriter, createAvatarTable, formatTimestamp } from '../../../src/presentation/ui/TableWriter';
import { RecordingWriter } from '../helpers/fakes';

describe('TableWriter', () => {
    it('should pad columns to the widest cell and upper-case status', () => {
        const out = new RecordingWriter();
        const table = createAvatarTable(out);

        table.addRow(['Nova', 'av-1', 'ready', 'not-a-date']);
        table.flush();

        expect(out.text).toBe('NAME  ID    STATUS  CREATED\nNova  av-1  READY   not-a-date\n');
        expect(table.rowCount).toBe(0);
    });

    it('should render missing cells as blanks', () => {
        const table = new TableWriter(['id', 'name']);

        table.addRow(['vp-1', undefined]);
        table.addRow([null, 'Calm']);

        expect(table.render()).toEqual(['ID    NAME', 'vp-1', '      Calm']);
    });

    it('should format timestamps in local time', () => {
        const local = new Date(2024, 4, 1, 9, 5);

        expect(formatTimestamp(local.toISOString())).toBe('2024-05-01 09:05');
        expect(formatTimestamp('yesterday')).toBe('yesterday');
        expect(formatTimestamp(undefined)).toBe('');
    });
});
