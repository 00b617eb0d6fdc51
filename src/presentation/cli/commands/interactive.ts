import { Command } from 'commander';
import { InteractiveProfile } from '../../../config';
import { StartSessionRequest } from '../../../domain/entities/InteractiveSession';
import { ValidationError } from '../../../domain/errors';
import { openUrl } from '../../ui/openUrl';
import { createSessionTable, formatTimestamp } from '../../ui/TableWriter';
import { CliContext, CliRuntime, contextFor, printJson } from '../context';
import { JsonFlags } from './shared';

export const DEFAULT_LLM_MODEL = 'gemini-2.0-flash';
export const DEFAULT_INSTRUCTION = 'You are a helpful AI assistant.';

type StartFlags = {
    profile?: string;
    avatar?: string;
    model?: string;
    llmModel?: string;
    voice?: string;
    instruction?: string;
    tools?: string;
    open: boolean;
};

function findProfile(ctx: CliContext, name: string): InteractiveProfile {
    const profiles = ctx.config.interactiveProfiles;
    const profile = profiles[name.toLowerCase()];
    if (!profile) {
        const available = Object.keys(profiles);
        throw new ValidationError(available.length > 0
            ? `interactive profile not found: ${name}. Available profiles: ${available.join(', ')}`
            : `interactive profile not found: ${name}. No profiles are configured`);
    }
    return profile;
}

/**
 * Flags win over the named profile, which wins over configured defaults.
 */
export function buildStartRequest(ctx: CliContext, options: StartFlags): StartSessionRequest {
    const profile: InteractiveProfile = options.profile ? findProfile(ctx, options.profile) : {};

    const avatarId = options.avatar || profile.avatarId;
    if (!avatarId) {
        throw new ValidationError('avatar ID is required. Use --avatar flag or an interactive profile');
    }

    const request: StartSessionRequest = {
        avatar_id: avatarId,
        model: options.model || profile.model || ctx.config.defaultModel,
        llm_model: options.llmModel || profile.llmModel || DEFAULT_LLM_MODEL,
        voice_profile_id: options.voice || profile.voiceProfileId || ctx.config.defaultVoice,
        instruction: options.instruction || profile.instruction || DEFAULT_INSTRUCTION,
    };
    const tools = options.tools || profile.tools;
    if (tools) {
        request.tools = tools;
    }
    return request;
}

export function registerInteractiveCommands(program: Command, runtime: CliRuntime): void {
    const interactive = program
        .command('interactive')
        .description('Start, stop and inspect interactive avatar sessions');

    interactive
        .command('list')
        .description('List active sessions')
        .option('-j, --json', 'Output in JSON format')
        .action(async (options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const sessions = await ctx.client.listSessions({ signal: ctx.signal });

            if (options.json) {
                printJson(sessions);
                return;
            }
            if (sessions.length === 0) {
                console.log('No active sessions found');
                return;
            }

            const table = createSessionTable(ctx.out);
            for (const session of sessions) {
                table.addRow([
                    session.session_id,
                    session.metis_model,
                    session.state,
                    session.desired_state,
                    formatTimestamp(session.start_time),
                ]);
            }
            table.flush();
        });

    interactive
        .command('start')
        .description('Start a new interactive session with an avatar')
        .option('--profile <name>', 'Use a saved interactive profile from the config file')
        .option('-a, --avatar <id>', 'Avatar ID to use')
        .option('-m, --model <model>', 'Model to use (defaults to the configured default model)')
        .option('-l, --llm-model <model>', `LLM model to use (default: ${DEFAULT_LLM_MODEL})`)
        .option('-v, --voice <id>', 'Voice profile ID (defaults to the configured default voice)')
        .option('-i, --instruction <text>', 'Instruction prompt')
        .option('--tools <json>', 'Tool definitions passed to the session')
        .option('--no-open', 'Do not open the session page in a browser')
        .action(async (options: StartFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const request = buildStartRequest(ctx, options);

            const result = await ctx.client.startSession(request, { signal: ctx.signal });

            console.log('✅ Session started successfully!');
            console.log(`   Session ID: ${result.session.session_id}`);
            console.log(`   Model: ${result.session.metis_model}`);
            console.log('You can use the following token for interactive api calls:');
            console.log(`   ${result.session_token}\n`);

            const url = `${ctx.config.interactiveUrl.replace(/\/+$/, '')}/${result.session.session_id}`;
            if (options.open && await openUrl(url)) {
                console.log(`Opened session in browser: ${url}`);
            } else {
                console.log(`You can now visit the url: ${url}`);
            }
        });

    interactive
        .command('stop')
        .description('Stop one or more interactive sessions')
        .argument('<session-ids...>', 'Session IDs to stop')
        .action(async (sessionIds: string[], _options: unknown, command: Command) => {
            const ctx = contextFor(command, runtime);
            const result = await ctx.client.stopSessions(sessionIds, { signal: ctx.signal });

            const stopped = result.stopped_sessions ?? [];
            if (stopped.length === 0) {
                console.log('No sessions were stopped');
                return;
            }
            console.log(`✅ Successfully stopped ${stopped.length} session(s):`);
            for (const id of stopped) {
                console.log(`   - ${id}`);
            }
        });

    interactive
        .command('profile')
        .description('Show the configuration a session was started with')
        .argument('<session-id>', 'Session ID')
        .option('-j, --json', 'Output in JSON format')
        .action(async (sessionId: string, options: JsonFlags, command: Command) => {
            const ctx = contextFor(command, runtime);
            const profile = await ctx.client.getSessionProfile(sessionId, { signal: ctx.signal });

            if (options.json) {
                printJson(profile);
                return;
            }

            console.log(`Session ID: ${profile.session_id ?? sessionId}`);
            if (profile.avatar_id) console.log(`Avatar ID: ${profile.avatar_id}`);
            if (profile.model) console.log(`Model: ${profile.model}`);
            if (profile.llm_model) console.log(`LLM Model: ${profile.llm_model}`);
            if (profile.voice_profile_id) console.log(`Voice Profile ID: ${profile.voice_profile_id}`);
            if (profile.instruction) console.log(`Instruction: ${profile.instruction}`);
            if (profile.tools) console.log(`Tools: ${profile.tools}`);
        });
}
