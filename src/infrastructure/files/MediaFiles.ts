import fsp from 'fs/promises';
import path from 'path';
import { IOError, ValidationError, errorMessage } from '../../domain/errors';

const AUDIO_EXTENSIONS = ['.wav', '.mp3'];

/**
 * Reads a local media file and returns it base64-encoded.
 * @param description what the file is, used in error messages ("image", "audio")
 */
export async function readFileAsBase64(filePath: string, description: string): Promise<string> {
    try {
        const data = await fsp.readFile(filePath);
        return data.toString('base64');
    } catch (error) {
        throw new IOError(`failed to read ${description} file: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Writes text output, creating parent directories as needed.
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
    try {
        await fsp.mkdir(path.dirname(filePath), { recursive: true });
        await fsp.writeFile(filePath, content, 'utf-8');
    } catch (error) {
        throw new IOError(`failed to save text: ${errorMessage(error)}`, { cause: error });
    }
}

function isAudioFile(fileName: string): boolean {
    return AUDIO_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/**
 * Recursively lists .wav and .mp3 files under a directory, sorted by path.
 */
export async function scanAudioFiles(dir: string): Promise<string[]> {
    const found: string[] = [];

    const walk = async (current: string): Promise<void> => {
        let entries;
        try {
            entries = await fsp.readdir(current, { withFileTypes: true });
        } catch (error) {
            throw new IOError(`failed to scan audio directory: ${errorMessage(error)}`, { cause: error });
        }
        for (const entry of entries) {
            const fullPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                await walk(fullPath);
            } else if (isAudioFile(entry.name)) {
                found.push(fullPath);
            }
        }
    };

    await walk(dir);
    return found.sort();
}

/**
 * Parses an annotation list (`filename.wav|transcription` per line) and
 * returns the referenced file names in order.
 */
export function parseAnnotationList(content: string): string[] {
    const files: string[] = [];
    const lines = content.trim().split('\n');

    lines.forEach((rawLine, index) => {
        const line = rawLine.trim();
        const lineNumber = index + 1;
        if (line === '') {
            return;
        }

        const parts = line.split('|');
        if (parts.length < 2) {
            throw new ValidationError(`invalid format on line ${lineNumber}: expected 'filename|transcription', got '${line}'`);
        }

        const fileName = parts[0].trim();
        if (fileName === '') {
            throw new ValidationError(`empty filename on line ${lineNumber}`);
        }
        if (!isAudioFile(fileName)) {
            throw new ValidationError(
                `invalid audio file extension on line ${lineNumber}: ${fileName} (only .wav and .mp3 are supported)`
            );
        }

        files.push(fileName);
    });

    if (files.length === 0) {
        throw new ValidationError('no valid audio file entries found in annotation file');
    }
    return files;
}

export async function parseAnnotationFile(annotationFile: string): Promise<string[]> {
    let content: string;
    try {
        content = await fsp.readFile(annotationFile, 'utf-8');
    } catch (error) {
        throw new IOError(`failed to open annotation file: ${errorMessage(error)}`, { cause: error });
    }
    return parseAnnotationList(content);
}

/**
 * Checks that the annotation list and the audio directory describe exactly the
 * same set of files (matched by base name).
 */
export async function validateVoiceCloneInput(audioDir: string, annotationFile: string): Promise<void> {
    let annotated: string[];
    try {
        annotated = await parseAnnotationFile(annotationFile);
    } catch (error) {
        if (error instanceof ValidationError) {
            throw new ValidationError(`invalid annotation file: ${error.message}`);
        }
        throw error;
    }

    const audioFiles = await scanAudioFiles(audioDir);
    const onDisk = new Set(audioFiles.map((file) => path.basename(file)));
    const listed = new Set(annotated);

    const missing = annotated.filter((file) => !onDisk.has(file));
    if (missing.length > 0) {
        throw new ValidationError(
            `annotation.list references ${missing.length} audio files that don't exist in the audio directory:\n${missing.join('\n')}`
        );
    }

    const extra = [...onDisk].filter((file) => !listed.has(file)).sort();
    if (extra.length > 0) {
        throw new ValidationError(
            `found ${extra.length} audio files in directory that are not included in annotation.list:\n${extra.join('\n')}\n`
            + 'Please either add them to annotation.list or remove them from the audio directory'
        );
    }
}
