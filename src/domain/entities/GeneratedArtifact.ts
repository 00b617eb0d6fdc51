/**
 * How a finished job hands back its output.
 * - 'inlineBase64': binary data inline, optionally as a data URL
 * - 'remoteUrl': a URL the file has to be downloaded from
 * - 'identifier': a resource id (built avatar, cloned voice profile)
 */
export type ArtifactKind = 'inlineBase64' | 'remoteUrl' | 'identifier';

export interface GeneratedArtifact {
    kind: ArtifactKind;
    data: string;
}

/**
 * File naming and extension rules for one kind of saved media.
 */
export interface MediaProfile {
    /** Default filename prefix, e.g. "image" for image_20240101_120000_000.jpg */
    prefix: string;
    /** Canonical extension including the dot */
    extension: string;
    /** Extensions accepted as-is (lower case, including the dot) */
    acceptedExtensions: readonly string[];
    /** Noun used in user-facing messages */
    noun: string;
}

export const MEDIA_PROFILES = {
    avatar: { prefix: 'avatar', extension: '.jpg', acceptedExtensions: ['.jpg', '.jpeg'], noun: 'Image' },
    image: { prefix: 'image', extension: '.jpg', acceptedExtensions: ['.jpg', '.jpeg'], noun: 'Image' },
    video: { prefix: 'video', extension: '.mp4', acceptedExtensions: ['.mp4'], noun: 'Video' },
    speech: { prefix: 'speech', extension: '.wav', acceptedExtensions: ['.wav'], noun: 'Audio' },
} as const satisfies Record<string, MediaProfile>;

export type MediaProfileName = keyof typeof MEDIA_PROFILES;

/**
 * Outcome of materializing an artifact.
 */
export type MaterializedArtifact =
    | { saved: true; path: string; bytes: number }
    | { saved: false; kind: ArtifactKind; description: string; bytes?: number; url?: string; id?: string };
