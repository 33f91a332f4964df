import { vi, type Mock } from 'vitest';
import { StubChatHandle, TieredChatHandle } from '../src/services/chat-handles';
import type { ILogger } from '../src/config/logger';
import type { ILlmRegistry } from '../src/services/llm-registry.service';
import type { BackendKind, ChatHandle, ChatMessage, CredentialCheck, LlmProfile } from '../src/types/llm';
import type { CandidateIntake } from '../src/types/candidate';

// The logger reads these when first imported, so set them before any test module loads
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

type ScriptedReply = string | Error | ((input: string) => string);

export interface MockLogger extends ILogger {
    info: Mock<ILogger['info']>;
    error: Mock<ILogger['error']>;
    warn: Mock<ILogger['warn']>;
    debug: Mock<ILogger['debug']>;
}

export interface ScriptedHandle extends ChatHandle {
    invoke: Mock<ChatHandle['invoke']>;
    prompts: string[];
    histories: ChatMessage[][];
}

export interface FakeRegistry extends ILlmRegistry {
    getClient: Mock<ILlmRegistry['getClient']>;
    verifyCredential: Mock<ILlmRegistry['verifyCredential']>;
}

// Global test utilities
declare global {
    var testUtils: {
        createMockLogger: () => MockLogger;
        createScriptedHandle: (replies: ScriptedReply[], options?: { kind?: BackendKind; label?: string }) => ScriptedHandle;
        createFakeRegistry: (handles: Partial<Record<LlmProfile, ChatHandle>>, fallback?: ChatHandle) => FakeRegistry;
        sampleIntake: (overrides?: Partial<CandidateIntake>) => CandidateIntake;
    };
}

globalThis.testUtils = {
    createMockLogger: () => ({
        info: vi.fn<ILogger['info']>(),
        error: vi.fn<ILogger['error']>(),
        warn: vi.fn<ILogger['warn']>(),
        debug: vi.fn<ILogger['debug']>()
    }),

    // Replies are consumed in order; the last one repeats once the rest are used.
    createScriptedHandle: (replies, options = {}) => {
        const queue = [...replies];
        const handle: ScriptedHandle = {
            backend: { kind: options.kind ?? 'remote', label: options.label ?? 'Scripted (test-model)' },
            keyFormatValid: true,
            prompts: [],
            histories: [],
            invoke: vi.fn<ChatHandle['invoke']>(async (input: string, history: ChatMessage[] = []) => {
                handle.prompts.push(input);
                handle.histories.push(history);
                const next = queue.length > 1 ? queue.shift() : queue[0];
                if (next === undefined) {
                    throw new Error('No scripted reply');
                }
                if (next instanceof Error) {
                    throw next;
                }
                return typeof next === 'function' ? next(input) : next;
            }),
            withFallback: (fallback: ChatHandle) => new TieredChatHandle(handle, fallback)
        };
        return handle;
    },

    // Profiles without a scripted handle get the fallback, a stub by default.
    createFakeRegistry: (handles, fallback = new StubChatHandle()) => {
        const stubCheck: CredentialCheck = { ok: false, message: 'No key provided' };
        return {
            getClient: vi.fn<ILlmRegistry['getClient']>((profile: LlmProfile) => handles[profile] ?? fallback),
            verifyCredential: vi.fn<ILlmRegistry['verifyCredential']>(async () => stubCheck),
            clearCache: vi.fn<ILlmRegistry['clearCache']>()
        };
    },

    sampleIntake: (overrides = {}) => ({
        fullName: 'Ada Example',
        email: 'ada@example.com',
        phone: '+1 (555) 010-2030',
        yearsOfExperience: 4,
        desiredPosition: 'Backend Engineer',
        location: 'Lisbon',
        techStack: 'Python, Django, SQL',
        ...overrides
    })
};
