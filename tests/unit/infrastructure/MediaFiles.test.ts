import fs from 'fs';
import os from 'os';
import path from 'path';
import { IOError, ValidationError } from '../../../src/domain/errors';
import {
    parseAnnotationList,
    readFileAsBase64,
    scanAudioFiles,
    validateVoiceCloneInput,
    writeTextFile,
} from '../../../src/infrastructure/files/MediaFiles';

describe('MediaFiles', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-files-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function touch(...segments: string[]): string {
        const filePath = path.join(tmpDir, ...segments);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, 'x');
        return filePath;
    }

    it('should read a file as base64', async () => {
        const filePath = path.join(tmpDir, 'face.jpg');
        fs.writeFileSync(filePath, 'ABC');

        await expect(readFileAsBase64(filePath, 'image')).resolves.toBe('QUJD');
    });

    it('should name the file type when reading fails', async () => {
        const error = await readFileAsBase64(path.join(tmpDir, 'missing.wav'), 'audio').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(IOError);
        expect(error).toHaveProperty('message', expect.stringMatching(/^failed to read audio file: ENOENT/));
    });

    it('should write text into new directories', async () => {
        const filePath = path.join(tmpDir, 'out', 'transcript.txt');

        await writeTextFile(filePath, 'hello world');

        expect(fs.readFileSync(filePath, 'utf-8')).toBe('hello world');
    });

    it('should find audio files recursively in sorted order', async () => {
        touch('b.MP3');
        touch('nested', 'a.wav');
        touch('notes.txt');

        await expect(scanAudioFiles(tmpDir)).resolves.toEqual([
            path.join(tmpDir, 'b.MP3'),
            path.join(tmpDir, 'nested', 'a.wav'),
        ]);
    });

    describe('parseAnnotationList', () => {
        it('should return the file names and skip blank lines', () => {
            expect(parseAnnotationList('one.wav|first line\n\n two.mp3 | second line \n')).toEqual(['one.wav', 'two.mp3']);
        });

        it('should report lines without a separator', () => {
            expect(() => parseAnnotationList('one.wav|ok\nbroken line'))
                .toThrow("invalid format on line 2: expected 'filename|transcription', got 'broken line'");
        });

        it('should report empty file names', () => {
            expect(() => parseAnnotationList(' |text')).toThrow('empty filename on line 1');
        });

        it('should report unsupported extensions', () => {
            expect(() => parseAnnotationList('clip.flac|text'))
                .toThrow('invalid audio file extension on line 1: clip.flac (only .wav and .mp3 are supported)');
        });

        it('should reject an empty list', () => {
            expect(() => parseAnnotationList('\n\n')).toThrow('no valid audio file entries found in annotation file');
        });
    });

    describe('validateVoiceCloneInput', () => {
        let audioDir: string;
        let annotationFile: string;

        beforeEach(() => {
            audioDir = path.join(tmpDir, 'audio');
            annotationFile = path.join(tmpDir, 'annotation.list');
        });

        it('should accept a matching dataset', async () => {
            touch('audio', 'a.wav');
            touch('audio', 'sub', 'b.mp3');
            fs.writeFileSync(annotationFile, 'a.wav|one\nb.mp3|two\n');

            await expect(validateVoiceCloneInput(audioDir, annotationFile)).resolves.toBeUndefined();
        });

        it('should list annotated files missing from the directory', async () => {
            touch('audio', 'a.wav');
            fs.writeFileSync(annotationFile, 'a.wav|one\nb.wav|two\nc.wav|three\n');

            await expect(validateVoiceCloneInput(audioDir, annotationFile)).rejects.toThrow(
                "annotation.list references 2 audio files that don't exist in the audio directory:\nb.wav\nc.wav"
            );
        });

        it('should list audio files the annotation leaves out', async () => {
            touch('audio', 'a.wav');
            touch('audio', 'z.wav');
            fs.writeFileSync(annotationFile, 'a.wav|one\n');

            await expect(validateVoiceCloneInput(audioDir, annotationFile)).rejects.toThrow(
                'found 1 audio files in directory that are not included in annotation.list:\nz.wav\n'
                + 'Please either add them to annotation.list or remove them from the audio directory'
            );
        });

        it('should prefix annotation format errors', async () => {
            touch('audio', 'a.wav');
            fs.writeFileSync(annotationFile, 'a.wav\n');

            const error = await validateVoiceCloneInput(audioDir, annotationFile).catch((err: unknown) => err);

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toHaveProperty(
                'message',
                "invalid annotation file: invalid format on line 1: expected 'filename|transcription', got 'a.wav'"
            );
        });

        it('should report a missing annotation file as an IO failure', async () => {
            await expect(validateVoiceCloneInput(audioDir, annotationFile)).rejects.toBeInstanceOf(IOError);
        });
    });
});
