import { randomUUID } from 'crypto';
import { SessionBusyError, SessionNotFoundError } from '../utils/errors';
import type { SessionState } from '../types/assessment';

export type NewSession = Omit<SessionState, 'id' | 'createdAt'>;

/**
 * In-memory session registry. Sessions live until deleted or the process
 * exits; nothing is written to disk.
 */
export class SessionStore {
    private sessions = new Map<string, SessionState>();
    private busy = new Set<string>();

    constructor(private generateId: () => string = randomUUID) { }

    get size(): number {
        return this.sessions.size;
    }

    create(initial: NewSession): SessionState {
        const session: SessionState = { ...initial, id: this.generateId(), createdAt: new Date() };
        this.sessions.set(session.id, session);
        return session;
    }

    get(id: string): SessionState | undefined {
        return this.sessions.get(id);
    }

    require(id: string): SessionState {
        const session = this.sessions.get(id);
        if (!session) {
            throw new SessionNotFoundError(id);
        }
        return session;
    }

    delete(id: string): boolean {
        this.busy.delete(id);
        return this.sessions.delete(id);
    }

    /**
     * Runs fn with the session held. A second call for the same session
     * while the first is pending is rejected with SessionBusyError.
     */
    async runExclusive<T>(id: string, fn: (session: SessionState) => Promise<T>): Promise<T> {
        const session = this.require(id);
        if (this.busy.has(id)) {
            throw new SessionBusyError(id);
        }

        this.busy.add(id);
        try {
            return await fn(session);
        } finally {
            this.busy.delete(id);
        }
    }
}
