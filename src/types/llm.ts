export type LlmProfile = 'evaluation' | 'conversation' | 'recommendation' | 'report';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface SamplingParameters {
    temperature: number;
    maxTokens: number;
    topP: number;
    presencePenalty: number;
    frequencyPenalty: number;
}

export type BackendKind = 'remote' | 'local' | 'stub' | 'tiered';

export interface BackendDescriptor {
    kind: BackendKind;
    label: string;
}

/**
 * Uniform chat capability implemented by the real client, the tiered
 * composite and the stub. Callers never learn which tier answered.
 */
export interface ChatHandle {
    readonly backend: BackendDescriptor;
    readonly keyFormatValid: boolean;
    invoke(input: string, history?: ChatMessage[]): Promise<string>;
    withFallback(fallback: ChatHandle): ChatHandle;
}

export interface ClientOverrides extends Partial<SamplingParameters> {
    apiKey?: string;
    allowLocalFallback?: boolean;
    localModelId?: string;
    model?: string;
}

export interface CredentialCheck {
    ok: boolean;
    message: string;
}
