/**
 * Wire status of an avatar: PENDING, BUILDING, READY or ERROR. READY and ERROR are terminal for a build.
 */
export type AvatarStatus = string;

export interface AvatarTheme {
    name: string;
    key_image?: string;
    live_video?: string;
}

export interface Avatar {
    id: string;
    name: string;
    status: AvatarStatus;
    created_at: string;
    user_id: string;
    themes?: AvatarTheme[];
}

export interface GenerateAvatarRequest {
    prompt: string;
    seed?: number;
}

export interface BuildAvatarRequest {
    name: string;
    /** Base64-encoded base image */
    image: string;
}

export interface BuildAvatarResult {
    avatar_id: string;
}
