import { Session } from './types';
import { TimerTimeoutPolicy } from './timeout';

export type SessionRecord = {
    id: string;
    createdAt: number;
    session: Session;
    timeouts: TimerTimeoutPolicy;
};

/**
 * Live sessions of this server, keyed by session id.
 * Held in memory; checkpointing a session is left to whoever hosts the store.
 */
export class SessionStore {
    private readonly sessions = new Map<string, SessionRecord>();

    get(id: string): SessionRecord | undefined {
        return this.sessions.get(id);
    }

    set(record: SessionRecord): void {
        this.sessions.set(record.id, record);
    }

    /**
     * Clears every armed reaction window. Sessions themselves are kept.
     */
    dispose(): void {
        for (const record of this.sessions.values()) record.timeouts.dispose();
    }
}
