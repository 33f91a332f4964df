import * as crypto from 'crypto';
import { logger, errorFields, type ILogger } from '../config/logger';
import type { LlmSettings } from '../config/environment';
import { sanitizeApiKey, validateApiKey } from '../utils/validators';
import { EmptyCompletionError } from '../utils/errors';
import { OpenAIChatHandle } from './openai.service';
import { StubChatHandle, TieredChatHandle, STUB_MARKER, UNAVAILABLE_MARKER } from './chat-handles';
import type {
    BackendKind,
    ChatHandle,
    ClientOverrides,
    CredentialCheck,
    LlmProfile,
    SamplingParameters
} from '../types/llm';

export const PROFILE_DEFAULTS: Record<LlmProfile, SamplingParameters> = {
    evaluation: {
        temperature: 0.4,
        maxTokens: 4028,
        topP: 0.95,
        presencePenalty: 0.6,
        frequencyPenalty: 0.3
    },
    conversation: {
        temperature: 0.7,
        maxTokens: 2000,
        topP: 1.0,
        presencePenalty: 0.0,
        frequencyPenalty: 0.0
    },
    recommendation: {
        temperature: 0.5,
        maxTokens: 4028,
        topP: 0.9,
        presencePenalty: 0.4,
        frequencyPenalty: 0.4
    },
    report: {
        temperature: 0.3,
        maxTokens: 4028,
        topP: 0.8,
        presencePenalty: 0.2,
        frequencyPenalty: 0.2
    }
};

const SECONDARY_MAX_TOKENS = 1024;
const EMPTY_REPLY_MESSAGE = 'Key appears valid (no content returned but no error).';

export type ClientTier = 'primary' | 'secondary' | 'local' | 'verify';

export interface ClientSpec {
    tier: ClientTier;
    kind: Exclude<BackendKind, 'stub' | 'tiered'>;
    apiKey: string;
    baseUrl: string;
    model: string;
    sampling: Partial<SamplingParameters>;
    keyFormatValid: boolean;
}

/** Constructs one concrete client; may throw. */
export type ChatHandleFactory = (spec: ClientSpec) => ChatHandle;

export interface ILlmRegistry {
    getClient(profile: LlmProfile, overrides?: ClientOverrides): ChatHandle;
    verifyCredential(apiKey: string): Promise<CredentialCheck>;
    clearCache(): void;
}

export function createOpenAIHandleFactory(settings: LlmSettings): ChatHandleFactory {
    return (spec) => OpenAIChatHandle.create(
        {
            apiKey: spec.apiKey,
            baseUrl: spec.baseUrl,
            timeoutMs: settings.timeoutMs
        },
        {
            model: spec.model,
            sampling: spec.sampling,
            backend: {
                kind: spec.kind,
                label: spec.kind === 'local' ? `Local (${spec.model})` : `Groq (${spec.model})`
            },
            keyFormatValid: spec.keyFormatValid,
            maxAttempts: spec.tier === 'verify' ? 1 : settings.maxAttempts
        }
    );
}

export function credentialFingerprint(apiKey: string): string {
    return crypto.createHash('sha256').update(apiKey).digest('hex').substring(0, 16);
}

function pickSampling(overrides: ClientOverrides): Partial<SamplingParameters> {
    const picked: Partial<SamplingParameters> = {};
    if (overrides.temperature !== undefined) picked.temperature = overrides.temperature;
    if (overrides.maxTokens !== undefined) picked.maxTokens = overrides.maxTokens;
    if (overrides.topP !== undefined) picked.topP = overrides.topP;
    if (overrides.presencePenalty !== undefined) picked.presencePenalty = overrides.presencePenalty;
    if (overrides.frequencyPenalty !== undefined) picked.frequencyPenalty = overrides.frequencyPenalty;
    return picked;
}

function reduceSampling(sampling: SamplingParameters): Partial<SamplingParameters> {
    return {
        temperature: sampling.temperature,
        maxTokens: Math.min(sampling.maxTokens, SECONDARY_MAX_TOKENS)
    };
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isRateLimitMessage(message: string): boolean {
    return message.includes('429') || message.toLowerCase().includes('rate limit');
}

function isAuthFailureMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return message.includes('401') || lower.includes('unauthorized') || lower.includes('invalid');
}

/**
 * LLM client registry
 *
 * Owns one chat handle per (profile, effective configuration) pair and
 * builds the primary -> local -> secondary -> stub chain. Never throws from
 * getClient(); degraded tiers are logged, not surfaced.
 */
export class LlmRegistry implements ILlmRegistry {
    private readonly instances = new Map<string, ChatHandle>();

    constructor(
        private settings: LlmSettings,
        private logger: ILogger,
        private factory: ChatHandleFactory = createOpenAIHandleFactory(settings)
    ) { }

    /**
     * Factory method for production use
     */
    static create(settings: LlmSettings): LlmRegistry {
        return new LlmRegistry(settings, logger);
    }

    get size(): number {
        return this.instances.size;
    }

    getClient(profile: LlmProfile, overrides: ClientOverrides = {}): ChatHandle {
        const sampling: SamplingParameters = { ...PROFILE_DEFAULTS[profile], ...pickSampling(overrides) };
        const apiKey = overrides.apiKey?.trim() || this.settings.defaultApiKey?.trim() || undefined;
        const allowLocal = overrides.allowLocalFallback ?? this.settings.allowLocalModels;
        const model = overrides.model ?? this.settings.primaryModel;
        const localModel = overrides.localModelId ?? this.settings.localModelId;

        const cacheKey = [
            profile,
            model,
            sampling.temperature,
            sampling.maxTokens,
            sampling.topP,
            sampling.presencePenalty,
            sampling.frequencyPenalty,
            allowLocal ? `local:${localModel}` : 'remote-only',
            apiKey ? credentialFingerprint(apiKey) : 'no-key'
        ].join('|');

        // get-or-create runs synchronously, so check-then-insert is atomic per key
        const cached = this.instances.get(cacheKey);
        if (cached) {
            return cached;
        }

        const handle = this.buildHandle(profile, sampling, model, localModel, allowLocal, apiKey);
        this.instances.set(cacheKey, handle);

        this.logger.info({
            profile,
            backend: handle.backend.label,
            kind: handle.backend.kind,
            keyFormatValid: handle.keyFormatValid
        }, 'LLM client created');

        return handle;
    }

    /**
     * Lightweight live check of a credential: one short round-trip,
     * failures classified by their error text. Never throws.
     */
    async verifyCredential(apiKey: string): Promise<CredentialCheck> {
        if (!apiKey || !apiKey.trim()) {
            return { ok: false, message: 'No key provided' };
        }

        const { key, warnings } = sanitizeApiKey(apiKey);
        if (!key) {
            return { ok: false, message: warnings.join('; ') };
        }

        let client: ChatHandle;
        try {
            client = this.factory({
                tier: 'verify',
                kind: 'remote',
                apiKey: key,
                baseUrl: this.settings.baseUrl,
                model: this.settings.verifyModel,
                sampling: { temperature: 0, maxTokens: 8 },
                keyFormatValid: true
            });
        } catch (error) {
            const message = messageOf(error);
            if (isAuthFailureMessage(message)) {
                return { ok: false, message: 'Authentication failed: invalid API key.' };
            }
            return { ok: false, message: `Unable to create client for verification: ${message}` };
        }

        try {
            const reply = await client.invoke('Ping');
            if (reply.trim()) {
                return { ok: true, message: 'Key validated: model responded.' };
            }
            return { ok: true, message: EMPTY_REPLY_MESSAGE };
        } catch (error) {
            if (error instanceof EmptyCompletionError) {
                return { ok: true, message: EMPTY_REPLY_MESSAGE };
            }
            const message = messageOf(error);
            this.logger.warn({
                fingerprint: credentialFingerprint(key),
                ...errorFields(error)
            }, 'Credential verification failed');

            if (isRateLimitMessage(message)) {
                return { ok: false, message: 'Rate limit or quota exceeded for this key.' };
            }
            if (isAuthFailureMessage(message)) {
                return { ok: false, message: 'Authentication failed: invalid API key.' };
            }
            return { ok: false, message: `Verification failed: ${message}` };
        }
    }

    clearCache(): void {
        this.instances.clear();
    }

    private buildHandle(
        profile: LlmProfile,
        sampling: SamplingParameters,
        model: string,
        localModel: string,
        allowLocal: boolean,
        apiKey: string | undefined
    ): ChatHandle {
        if (!apiKey && !allowLocal) {
            this.logger.info({ profile }, 'No API key and local models disabled; using stub LLM');
            return new StubChatHandle(STUB_MARKER, 'Local Stub (no key)');
        }

        const keyFormatValid = validateApiKey(apiKey);
        if (apiKey && !keyFormatValid) {
            this.logger.warn({
                profile,
                fingerprint: credentialFingerprint(apiKey)
            }, 'Provided API key appears malformed; continuing but the server may reject it');
        }

        const primary = apiKey
            ? this.tryCreate({
                tier: 'primary',
                kind: 'remote',
                apiKey,
                baseUrl: this.settings.baseUrl,
                model,
                sampling,
                keyFormatValid
            })
            : null;

        const local = allowLocal
            ? this.tryCreate({
                tier: 'local',
                kind: 'local',
                apiKey: 'local',
                baseUrl: this.settings.localModelUrl,
                model: localModel,
                sampling,
                keyFormatValid: false
            })
            : null;

        const remoteSecondary = apiKey
            ? this.tryCreate({
                tier: 'secondary',
                kind: 'remote',
                apiKey,
                baseUrl: this.settings.baseUrl,
                model: this.settings.secondaryModel,
                sampling: reduceSampling(sampling),
                keyFormatValid
            })
            : null;

        // primary -> local -> secondary; absent tiers drop out of the chain
        const secondary = this.chain(profile, local, remoteSecondary, 'Local LLM tier failed; falling back');
        const available = this.chain(profile, primary, secondary, 'Primary LLM tier failed; falling back');
        if (available) {
            return available;
        }

        this.logger.warn({ profile }, 'All LLM tiers failed to construct; using unavailable stub');
        return new StubChatHandle(UNAVAILABLE_MARKER, 'Unavailable (all tiers failed)');
    }

    private chain(
        profile: LlmProfile,
        first: ChatHandle | null,
        fallback: ChatHandle | null,
        failureMessage: string
    ): ChatHandle | null {
        if (first && fallback) {
            const tiers = { primary: first.backend.label, secondary: fallback.backend.label };
            return new TieredChatHandle(first, fallback, (error) => {
                this.logger.warn({
                    profile,
                    ...tiers,
                    ...errorFields(error)
                }, failureMessage);
            });
        }
        return first ?? fallback;
    }

    private tryCreate(spec: ClientSpec): ChatHandle | null {
        try {
            return this.factory(spec);
        } catch (error) {
            this.logger.warn({
                tier: spec.tier,
                model: spec.model,
                ...errorFields(error)
            }, 'LLM client construction failed');
            return null;
        }
    }
}
