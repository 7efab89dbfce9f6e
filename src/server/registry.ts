import type { PeerInfo, Session } from "../session.js";

/**
 * Sessions by "ip:port". Owned by one listener; only touched from event
 * callbacks, never across an await.
 */
export class PeerRegistry {
    private readonly sessions: Map<string, Session> = new Map();

    get size(): number {
        return this.sessions.size;
    }

    get(identifier: string): Session | undefined {
        return this.sessions.get(identifier);
    }

    /** Register a session. Throws if the identifier is taken. */
    add(session: Session): void {
        if (this.sessions.has(session.identifier)) {
            throw new Error(`Peer already registered: ${session.identifier}`);
        }
        this.sessions.set(session.identifier, session);
    }

    /**
     * Remove `session` if it is still the one registered under its
     * identifier. A stale session never evicts its replacement.
     */
    remove(session: Session): boolean {
        if (this.sessions.get(session.identifier) !== session) return false;
        return this.sessions.delete(session.identifier);
    }

    /** Every registered session, as an array safe to iterate while mutating. */
    all(): Session[] {
        return Array.from(this.sessions.values());
    }

    /** Active sessions other than `except`. */
    active(except?: Session): Session[] {
        return this.all().filter((session) => session !== except && session.isActive);
    }

    /** Sessions with no inbound traffic for more than `timeoutMs`. */
    idle(now: number, timeoutMs: number): Session[] {
        return this.all().filter((session) => session.idleFor(now) > timeoutMs);
    }

    snapshot(): PeerInfo[] {
        return this.all().map((session) => session.info);
    }

    /** Empty the registry, returning what it held. */
    drain(): Session[] {
        const sessions = this.all();
        this.sessions.clear();
        return sessions;
    }
}
