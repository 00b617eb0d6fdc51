import { Command } from 'commander';
import {
    DEFAULT_TTS_FRAGMENT_INTERVAL,
    DEFAULT_TTS_TEMPERATURE,
    parseBoundedNumber,
    parseChineseLanguage,
    requireValue,
} from '../../../application/inputValidation';
import { MEDIA_PROFILES } from '../../../domain/entities/GeneratedArtifact';
import { TextToSpeechRequest } from '../../../domain/entities/Speech';
import { TransportError } from '../../../domain/errors';
import { readFileAsBase64, writeTextFile } from '../../../infrastructure/files/MediaFiles';
import { CliRuntime, contextFor } from '../context';

type SttFlags = { audio?: string; output?: string };

type TtsFlags = {
    text?: string;
    voice?: string;
    chinese?: string;
    temperature: string;
    fragmentInterval: string;
    output?: string;
    save: boolean;
};

export function registerSpeechCommands(program: Command, runtime: CliRuntime): void {
    const speech = program
        .command('speech')
        .description('Speech-to-text and text-to-speech');

    speech
        .command('stt')
        .description('Transcribe an audio file')
        .option('-a, --audio <path>', 'Path to the audio file')
        .option('-o, --output <path>', 'Write the transcript to a file instead of printing it')
        .action(async (options: SttFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const audioPath = requireValue(options.audio, 'audio path', 'audio');
            const audio = await readFileAsBase64(audioPath, 'audio');
            const client = ctx.client;

            const result = await ctx.generation.runWithProgress(
                'TRANSCRIBING',
                (signal) => client.speechToText(audio, { signal }),
                ctx.signal
            );

            if (options.output) {
                await writeTextFile(options.output, result.text);
                console.log(`💾 Transcript saved to: ${options.output}`);
                return;
            }
            console.log(result.text);
        });

    speech
        .command('tts')
        .description('Synthesize speech from text')
        .option('-t, --text <text>', 'Text to synthesize')
        .option('-v, --voice <id>', 'Voice profile ID (defaults to the configured default voice)')
        .option('--chinese <language>', 'Chinese variant: mandarin or yue')
        .option('-T, --temperature <value>', 'Temperature for TTS generation (0.0-1.0)', String(DEFAULT_TTS_TEMPERATURE))
        .option('-f, --fragment-interval <value>', 'Fragment interval between sentences (0.0-1.0)', String(DEFAULT_TTS_FRAGMENT_INTERVAL))
        .option('-o, --output <path>', 'Output file path for the generated audio')
        .option('-n, --no-save', 'Skip saving the audio to disk')
        .action(async (options: TtsFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const text = requireValue(options.text, 'text', 'text');
            const voice = requireValue(options.voice || ctx.config.defaultVoice, 'voice profile ID', 'voice');
            const chinese = parseChineseLanguage(options.chinese);
            const temperature = parseBoundedNumber(options.temperature, 'temperature', 0, 1);
            const fragmentInterval = parseBoundedNumber(options.fragmentInterval, 'fragment-interval', 0, 1);

            const request: TextToSpeechRequest = {
                text,
                voice_profile_id: voice,
                return_type: 'b64_audio_str',
            };
            if (chinese) {
                request.chinese_language = chinese;
            }
            // Only send tuning values the user actually changed
            if (temperature !== DEFAULT_TTS_TEMPERATURE || fragmentInterval !== DEFAULT_TTS_FRAGMENT_INTERVAL) {
                request.opts = { temperature, fragment_interval: fragmentInterval };
            }

            const client = ctx.client;
            const result = await ctx.generation.runWithProgress(
                'SYNTHESIZING',
                (signal) => client.textToSpeech(request, { signal }),
                ctx.signal
            );
            if (!result.b64_audio_str) {
                throw new TransportError('unexpected response from server: no audio returned', 0, 'text to speech');
            }

            console.log('✅ Speech synthesized!');
            if (result.output_duration !== undefined) {
                console.log(`   Duration: ${result.output_duration.toFixed(2)}s`);
            }

            await ctx.generation.save(
                { kind: 'inlineBase64', data: result.b64_audio_str },
                MEDIA_PROFILES.speech,
                {
                    skipSave: !options.save,
                    outputPath: options.output,
                    saveDir: ctx.config.defaultSavePath,
                    signal: ctx.signal,
                }
            );
        });
}
