import { IMAGE_ASPECT_RATIOS, ImageAspectRatio } from '../domain/entities/GenerationTask';
import { ChineseLanguage } from '../domain/entities/Speech';
import { ValidationError } from '../domain/errors';

export const MAX_PROMPT_LENGTH = 1000;
export const MAX_REFERENCE_IMAGES = 5;

export const DEFAULT_TTS_TEMPERATURE = 1.0;
export const DEFAULT_TTS_FRAGMENT_INTERVAL = 0.1;

export interface LabeledImagePath {
    label: string;
    path: string;
}

export function requireValue(value: string | undefined, name: string, flag: string): string {
    const trimmed = value?.trim();
    if (!trimmed) {
        throw new ValidationError(`${name} is required. Use --${flag} flag`);
    }
    return trimmed;
}

/**
 * Prompt must be present and at most MAX_PROMPT_LENGTH characters.
 */
export function validatePrompt(prompt: string | undefined): string {
    const value = requireValue(prompt, 'prompt', 'prompt');
    if (value.length > MAX_PROMPT_LENGTH) {
        throw new ValidationError(`prompt is too long (max ${MAX_PROMPT_LENGTH} characters, got ${value.length})`);
    }
    return value;
}

export function parseAspectRatio(value: string): ImageAspectRatio {
    const match = IMAGE_ASPECT_RATIOS.find((ratio) => ratio === value);
    if (!match) {
        throw new ValidationError(`invalid aspect ratio: ${value}. Valid options: ${IMAGE_ASPECT_RATIOS.join(', ')}`);
    }
    return match;
}

/**
 * Parses a `LABEL=PATH` flag value. Only the first `=` separates.
 */
export function parseLabeledImage(value: string): LabeledImagePath {
    const index = value.indexOf('=');
    if (index <= 0 || index === value.length - 1) {
        throw new ValidationError(`invalid labeled image format: ${value} (expected LABEL=PATH)`);
    }
    return { label: value.slice(0, index).trim(), path: value.slice(index + 1).trim() };
}

export function validateReferenceImageCount(images: readonly string[], labeledImages: readonly LabeledImagePath[]): void {
    const total = images.length + labeledImages.length;
    if (total > MAX_REFERENCE_IMAGES) {
        throw new ValidationError(`too many input images: ${total} (max ${MAX_REFERENCE_IMAGES} combined)`);
    }
}

export function parseChineseLanguage(value: string | undefined): ChineseLanguage | undefined {
    if (value === undefined || value === '') {
        return undefined;
    }
    if (value === 'mandarin' || value === 'yue') {
        return value;
    }
    throw new ValidationError(`invalid chinese language: ${value} (expected mandarin or yue)`);
}

/**
 * Parses a number flag that must fall in [min, max].
 */
export function parseBoundedNumber(value: string, name: string, min: number, max: number): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed) || parsed < min || parsed > max) {
        throw new ValidationError(`${name} must be a number between ${min} and ${max}, got: ${value}`);
    }
    return parsed;
}

export function parsePositiveInteger(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ValidationError(`${name} must be a positive integer, got: ${value}`);
    }
    return parsed;
}

export function parseSeed(value: string): number {
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed) || parsed < 0) {
        throw new ValidationError(`seed must be a non-negative integer, got: ${value}`);
    }
    return parsed;
}
