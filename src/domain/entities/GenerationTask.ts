/**
 * Response bodies shared by the async generate endpoints.
 */
export interface AsyncTaskAccepted {
    task_id: string;
    status?: string;
}

export interface GenerateImageTaskStatus {
    task_id: string;
    status: string;
    /** Base64 image, sometimes as a data URL */
    image?: string;
    error?: string;
}

export interface TalkingAvatarTaskStatus {
    task_id: string;
    status: string;
    file_url?: string;
    output_duration?: number;
    error?: string;
}

export const IMAGE_ASPECT_RATIOS = ['1:1', '16:9', '2:3', '3:2', '3:4', '4:3', '9:16'] as const;

export type ImageAspectRatio = (typeof IMAGE_ASPECT_RATIOS)[number];

export interface LabeledImage {
    label: string;
    /** Base64-encoded image */
    image: string;
}

export interface GenerateImageRequest {
    prompt: string;
    aspect_ratio: ImageAspectRatio;
    seed?: number;
    images?: string[];
    labeled_images?: LabeledImage[];
}

export interface GenerateTalkingAvatarRequest {
    /** Base64-encoded audio */
    audio: string;
    /** Base64-encoded face image */
    image: string;
}
