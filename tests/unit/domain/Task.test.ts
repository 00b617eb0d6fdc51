import {
    createStatusClassifier,
    createTaskStatus,
    isFailureState,
    isTerminalState,
} from '../../../src/domain/entities/Task';

describe('Task', () => {
    describe('createTaskStatus', () => {
        it('should freeze the snapshot', () => {
            const status = createTaskStatus({ state: 'processing', label: 'PROCESSING' });

            expect(Object.isFrozen(status)).toBe(true);
            expect(status).toEqual({ state: 'processing', label: 'PROCESSING' });
        });

        it('should require a payload for completed snapshots', () => {
            expect(() => createTaskStatus({ state: 'completed', label: 'COMPLETED' }))
                .toThrow('Task status COMPLETED is completed but carries no result');
        });

        it('should reject a payload on an unfinished snapshot', () => {
            expect(() => createTaskStatus({
                state: 'pending',
                label: 'IN_QUEUE',
                payload: { kind: 'identifier', data: 'x' },
            })).toThrow('Task status IN_QUEUE carries a result but is not completed');
        });

        it('should only allow an error detail on failure states', () => {
            expect(() => createTaskStatus({ state: 'processing', label: 'PROCESSING', errorDetail: 'boom' }))
                .toThrow('Task status PROCESSING carries an error detail but is not a failure');
            expect(createTaskStatus({ state: 'failed', label: 'FAILED', errorDetail: 'boom' }).errorDetail).toBe('boom');
        });

        it('should drop an empty error detail', () => {
            expect(createTaskStatus({ state: 'failed', label: 'FAILED', errorDetail: '' })).toEqual({ state: 'failed', label: 'FAILED' });
        });
    });

    it('should treat completion and every failure state as terminal', () => {
        expect(isTerminalState('completed')).toBe(true);
        expect(isTerminalState('failed')).toBe(true);
        expect(isTerminalState('canceled')).toBe(true);
        expect(isTerminalState('timedOut')).toBe(true);
        expect(isTerminalState('pending')).toBe(false);
        expect(isTerminalState('processing')).toBe(false);
        expect(isFailureState('completed')).toBe(false);
    });

    describe('createStatusClassifier', () => {
        const classify = createStatusClassifier({
            completed: ['DONE'],
            failed: ['BROKEN'],
            canceled: ['STOPPED'],
            pending: ['WAITING'],
        });

        it('should map listed labels onto their state', () => {
            expect(classify('DONE')).toBe('completed');
            expect(classify('BROKEN')).toBe('failed');
            expect(classify('STOPPED')).toBe('canceled');
            expect(classify('WAITING')).toBe('pending');
        });

        it('should match case-sensitively and default to processing', () => {
            expect(classify('done')).toBe('processing');
            expect(classify('SOMETHING_NEW')).toBe('processing');
            expect(classify('')).toBe('processing');
        });
    });
});
