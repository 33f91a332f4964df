import type { BackendDescriptor, ChatHandle, ChatMessage } from '../types/llm';

export const STUB_MARKER = '[no-key-stub]';
export const UNAVAILABLE_MARKER = '[unavailable-lm]';

/**
 * Shared composition behaviour: any handle can be given a fallback tier.
 */
export abstract class BaseChatHandle implements ChatHandle {
    abstract readonly backend: BackendDescriptor;
    abstract readonly keyFormatValid: boolean;

    abstract invoke(input: string, history?: ChatMessage[]): Promise<string>;

    withFallback(fallback: ChatHandle): ChatHandle {
        return new TieredChatHandle(this, fallback);
    }
}

/**
 * Primary-then-secondary composite. A failure of the primary is retried
 * once against the secondary with identical input and history; a failure
 * there propagates to the caller.
 */
export class TieredChatHandle extends BaseChatHandle {
    readonly backend: BackendDescriptor;
    readonly keyFormatValid: boolean;

    constructor(
        readonly primary: ChatHandle,
        readonly secondary: ChatHandle,
        private readonly onPrimaryFailure?: (error: unknown) => void
    ) {
        super();
        this.backend = {
            kind: 'tiered',
            label: `${primary.backend.label} -> ${secondary.backend.label}`
        };
        this.keyFormatValid = primary.keyFormatValid;
    }

    async invoke(input: string, history: ChatMessage[] = []): Promise<string> {
        try {
            return await this.primary.invoke(input, history);
        } catch (error) {
            this.onPrimaryFailure?.(error);
            return await this.secondary.invoke(input, history);
        }
    }
}

/**
 * Degraded stand-in used when no credential or model is available.
 * Echoes the prompt behind a fixed marker; callers that need real model
 * output check isStubHandle() and skip the call.
 */
export class StubChatHandle implements ChatHandle {
    readonly backend: BackendDescriptor;
    readonly keyFormatValid = false;

    constructor(private readonly marker: string = STUB_MARKER, label: string = 'Local Stub (no key)') {
        this.backend = { kind: 'stub', label };
    }

    async invoke(input: string): Promise<string> {
        return `${this.marker} ${input}`;
    }

    withFallback(fallback: ChatHandle): ChatHandle {
        return fallback;
    }
}

export function isStubHandle(handle: ChatHandle): boolean {
    return handle.backend.kind === 'stub';
}
