import axios, { AxiosInstance } from 'axios';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { GeneratedArtifact, MaterializedArtifact, MediaProfile } from '../../domain/entities/GeneratedArtifact';
import { DecodeError, DownloadError, IOError, errorMessage } from '../../domain/errors';

export interface MaterializeRequest {
    artifact: GeneratedArtifact;
    profile: MediaProfile;
    /** When true nothing is written, only a description is returned */
    skipSave: boolean;
    /** Explicit destination; the profile's extension is still enforced */
    outputPath?: string;
    /** Directory for generated default filenames */
    saveDir: string;
    /** Clock override for the default filename */
    now?: Date;
    signal?: AbortSignal;
}

const DATA_URL_PREFIX = /^data:[^,]*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Appends the profile's canonical extension unless the path already ends with
 * an accepted one. Applying it twice changes nothing.
 */
export function ensureExtension(filePath: string, profile: MediaProfile): string {
    const lower = filePath.toLowerCase();
    if (profile.acceptedExtensions.some((ext) => lower.endsWith(ext))) {
        return filePath;
    }
    return `${filePath}${profile.extension}`;
}

/**
 * Local timestamp used in generated filenames, e.g. 20240131_154502_087.
 */
export function formatFileTimestamp(date: Date): string {
    const pad = (value: number, width = 2) => String(value).padStart(width, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
        + `_${pad(date.getMilliseconds(), 3)}`;
}

export function defaultOutputPath(profile: MediaProfile, saveDir: string, suffix: string): string {
    return path.join(saveDir, `${profile.prefix}_${suffix}${profile.extension}`);
}

export function stripDataUrlPrefix(data: string): string {
    return data.replace(DATA_URL_PREFIX, '');
}

/**
 * Strict base64 decode. Buffer.from silently skips invalid characters, so the
 * input is checked first. Line breaks are tolerated.
 */
export function decodeBase64(data: string): Buffer {
    const body = stripDataUrlPrefix(data.trim()).replace(/[\r\n]/g, '');
    if (body.length % 4 !== 0 || !BASE64_BODY.test(body)) {
        throw new DecodeError('failed to decode base64 data: input is not valid base64');
    }
    return Buffer.from(body, 'base64');
}

/**
 * Turns a finished job's artifact into a file on disk, or describes it when
 * saving is skipped.
 */
export class ArtifactMaterializer {
    private readonly http: AxiosInstance;

    constructor(http?: AxiosInstance) {
        this.http = http ?? axios.create({ timeout: 0 });
    }

    async materialize(request: MaterializeRequest): Promise<MaterializedArtifact> {
        const { artifact } = request;

        if (artifact.kind === 'identifier') {
            return { saved: false, kind: artifact.kind, id: artifact.data, description: `ID: ${artifact.data}` };
        }

        if (request.skipSave) {
            return this.describe(artifact);
        }

        const outputPath = this.resolveOutputPath(request);

        if (artifact.kind === 'inlineBase64') {
            const bytes = decodeBase64(artifact.data);
            await this.ensureParentDir(outputPath);
            try {
                await fsp.writeFile(outputPath, bytes);
            } catch (error) {
                throw new IOError(`failed to save ${request.profile.noun.toLowerCase()}: ${errorMessage(error)}`, { cause: error });
            }
            return { saved: true, path: outputPath, bytes: bytes.length };
        }

        await this.ensureParentDir(outputPath);
        const bytes = await this.download(artifact.data, outputPath, request.signal);
        return { saved: true, path: outputPath, bytes };
    }

    resolveOutputPath(request: Pick<MaterializeRequest, 'profile' | 'outputPath' | 'saveDir' | 'now'>): string {
        const chosen = request.outputPath
            ? request.outputPath
            : defaultOutputPath(request.profile, request.saveDir, formatFileTimestamp(request.now ?? new Date()));
        return ensureExtension(chosen, request.profile);
    }

    private describe(artifact: GeneratedArtifact): MaterializedArtifact {
        if (artifact.kind === 'remoteUrl') {
            return { saved: false, kind: artifact.kind, url: artifact.data, description: `URL: ${artifact.data}` };
        }
        // Size only, nothing is decoded when the result is not saved
        const body = stripDataUrlPrefix(artifact.data.trim()).replace(/\s/g, '');
        const bytes = Buffer.byteLength(body, 'base64');
        return { saved: false, kind: artifact.kind, bytes, description: `${bytes} bytes` };
    }

    private async ensureParentDir(filePath: string): Promise<void> {
        const dir = path.dirname(filePath);
        try {
            await fsp.mkdir(dir, { recursive: true });
        } catch (error) {
            throw new IOError(`failed to create directory ${dir}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Streams the URL body straight into the destination file.
     */
    private async download(url: string, outputPath: string, signal?: AbortSignal): Promise<number> {
        let body: Readable;
        try {
            const response = await this.http.get<Readable>(url, {
                responseType: 'stream',
                signal,
                validateStatus: () => true,
            });
            if (response.status < 200 || response.status >= 300) {
                response.data.resume();
                throw new DownloadError(`failed to download ${url}: HTTP ${response.status}`, response.status);
            }
            body = response.data;
        } catch (error) {
            if (error instanceof DownloadError) throw error;
            throw new DownloadError(`failed to download ${url}: ${errorMessage(error)}`, undefined, { cause: error });
        }

        let writer: fs.WriteStream;
        try {
            writer = fs.createWriteStream(outputPath);
        } catch (error) {
            throw new IOError(`failed to create output file: ${errorMessage(error)}`, { cause: error });
        }

        return new Promise<number>((resolve, reject) => {
            let bytes = 0;
            let failed = false;
            const fail = (err: Error) => {
                if (failed) return;
                failed = true;
                body.unpipe(writer);
                writer.destroy();
                // No partial file is left behind
                fsp.rm(outputPath, { force: true }).then(
                    () => reject(err),
                    () => reject(err)
                );
            };

            body.on('data', (chunk: Buffer) => {
                bytes += chunk.length;
            });
            body.on('error', (err: Error) => fail(new DownloadError(`download stream error: ${err.message}`, undefined, { cause: err })));
            writer.on('error', (err: Error) => fail(new IOError(`failed to save file: ${err.message}`, { cause: err })));
            writer.on('finish', () => {
                if (!failed) resolve(bytes);
            });

            body.pipe(writer);
        });
    }
}
