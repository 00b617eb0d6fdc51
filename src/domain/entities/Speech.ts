export type ChineseLanguage = 'mandarin' | 'yue';

export interface TtsParams {
    temperature?: number;
    fragment_interval?: number;
}

export interface TextToSpeechRequest {
    text: string;
    voice_profile_id: string;
    return_type: 'b64_audio_str';
    chinese_language?: ChineseLanguage;
    opts?: TtsParams;
}

export interface TextToSpeechResult {
    b64_audio_str?: string;
    output_duration?: number;
}

export interface SpeechToTextResult {
    text: string;
}
