import {
    parseAspectRatio,
    parseBoundedNumber,
    parseChineseLanguage,
    parseLabeledImage,
    parsePositiveInteger,
    parseSeed,
    requireValue,
    validatePrompt,
    validateReferenceImageCount,
} from '../../../src/application/inputValidation';
import { ValidationError } from '../../../src/domain/errors';

describe('inputValidation', () => {
    describe('validatePrompt', () => {
        it('should trim and accept a prompt at the limit', () => {
            expect(validatePrompt('  a quiet harbor  ')).toBe('a quiet harbor');
            expect(validatePrompt('x'.repeat(1000))).toHaveLength(1000);
        });

        it('should reject a missing prompt with the flag to use', () => {
            expect(() => validatePrompt(undefined)).toThrow('prompt is required. Use --prompt flag');
            expect(() => validatePrompt('   ')).toThrow(ValidationError);
        });

        it('should reject a prompt over the limit', () => {
            expect(() => validatePrompt('x'.repeat(1001)))
                .toThrow('prompt is too long (max 1000 characters, got 1001)');
        });
    });

    it('should name the flag for other required values', () => {
        expect(() => requireValue('', 'avatar ID', 'avatar-id')).toThrow('avatar ID is required. Use --avatar-id flag');
    });

    it('should accept only known aspect ratios', () => {
        expect(parseAspectRatio('9:16')).toBe('9:16');
        expect(() => parseAspectRatio('5:4'))
            .toThrow('invalid aspect ratio: 5:4. Valid options: 1:1, 16:9, 2:3, 3:2, 3:4, 4:3, 9:16');
    });

    describe('parseLabeledImage', () => {
        it('should split on the first equals sign', () => {
            expect(parseLabeledImage('style=./refs/a=b.jpg')).toEqual({ label: 'style', path: './refs/a=b.jpg' });
        });

        it.each(['noequals.jpg', '=path.jpg', 'label='])('should reject %s', (value) => {
            expect(() => parseLabeledImage(value))
                .toThrow(`invalid labeled image format: ${value} (expected LABEL=PATH)`);
        });
    });

    it('should cap plain and labeled reference images together', () => {
        const labeled = [{ label: 'a', path: 'a.jpg' }, { label: 'b', path: 'b.jpg' }];

        expect(() => validateReferenceImageCount(['1.jpg', '2.jpg', '3.jpg'], labeled)).not.toThrow();
        expect(() => validateReferenceImageCount(['1.jpg', '2.jpg', '3.jpg', '4.jpg'], labeled))
            .toThrow('too many input images: 6 (max 5 combined)');
    });

    it('should parse the Chinese language option', () => {
        expect(parseChineseLanguage(undefined)).toBeUndefined();
        expect(parseChineseLanguage('yue')).toBe('yue');
        expect(() => parseChineseLanguage('cantonese'))
            .toThrow('invalid chinese language: cantonese (expected mandarin or yue)');
    });

    it('should bound numeric flags', () => {
        expect(parseBoundedNumber('0.5', 'temperature', 0, 2)).toBe(0.5);
        expect(() => parseBoundedNumber('3', 'temperature', 0, 2))
            .toThrow('temperature must be a number between 0 and 2, got: 3');
        expect(() => parseBoundedNumber(' ', 'temperature', 0, 2)).toThrow(ValidationError);
    });

    it('should parse integers', () => {
        expect(parsePositiveInteger('5', 'poll-interval')).toBe(5);
        expect(() => parsePositiveInteger('1.5', 'poll-interval'))
            .toThrow('poll-interval must be a positive integer, got: 1.5');
        expect(parseSeed('0')).toBe(0);
        expect(() => parseSeed('-1')).toThrow('seed must be a non-negative integer, got: -1');
    });
});
