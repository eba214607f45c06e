import crypto from 'crypto';
import type { AuthRepository } from '../../db/auth.repository';
import type { AnonymousSession, StartedSession } from '../../types/auth';
import { systemClock } from '../../utils/time';
import type { Clock } from '../../utils/time';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger('session-manager');

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{16,128}$/;

export function generateSessionId(): string {
    return `anon_${crypto.randomBytes(32).toString('base64url')}`;
}

export interface CreateAnonymousResult {
    session: AnonymousSession;
    /** False when an existing live session was resumed */
    created: boolean;
    /** The chat opened with the session; null if a resumed session has no active chat left */
    chatId: number | null;
}

export type PromoteResult =
    | { ok: true; resourcesMoved: number }
    | { ok: false; error: 'NotFound' };

/**
 * Anonymous sessions: credential-less identities that own chats until they
 * are promoted to a registered user.
 */
export class AnonymousSessionManager {
    private readonly clock: Clock;

    constructor(private readonly repository: AuthRepository, options: { clock?: Clock } = {}) {
        this.clock = options.clock ?? systemClock;
    }

    async createAnonymous(requestedId?: string): Promise<CreateAnonymousResult> {
        if (requestedId !== undefined && SESSION_ID_PATTERN.test(requestedId)) {
            const existing = await this.repository.findAnonymousSession(requestedId);
            if (existing && !existing.promoted_at) {
                return this.resume(existing);
            }
            if (!existing) {
                const started = await this.repository.insertAnonymousSession(requestedId, this.clock());
                if (started) {
                    log.debug({ sessionId: started.session.id }, 'Anonymous session created with requested id');
                    return { session: started.session, created: true, chatId: started.chatId };
                }
                // Someone created it between our read and insert
                const raced = await this.repository.findAnonymousSession(requestedId);
                if (raced && !raced.promoted_at) {
                    return this.resume(raced);
                }
            }
            // A promoted id is never handed out again
        }

        const started = await this.createFresh();
        return { session: started.session, created: true, chatId: started.chatId };
    }

    async resolve(sessionId: string): Promise<AnonymousSession | null> {
        if (!SESSION_ID_PATTERN.test(sessionId)) return null;
        const session = await this.repository.findAnonymousSession(sessionId);
        if (!session || session.promoted_at) return null;
        return session;
    }

    async promote(sessionId: string, userId: number): Promise<PromoteResult> {
        if (!SESSION_ID_PATTERN.test(sessionId)) return { ok: false, error: 'NotFound' };

        const moved = await this.repository.promoteAnonymousSession(sessionId, userId, this.clock());
        if (moved === null) return { ok: false, error: 'NotFound' };

        log.info({ sessionId, userId, resourcesMoved: moved }, 'Anonymous session promoted');
        return { ok: true, resourcesMoved: moved };
    }

    private async resume(session: AnonymousSession): Promise<CreateAnonymousResult> {
        const chatId = await this.repository.findSessionChat(session.id);
        return { session, created: false, chatId };
    }

    private async createFresh(): Promise<StartedSession> {
        // The insert does nothing on an id collision; draw again
        for (let attempt = 0; attempt < 3; attempt++) {
            const started = await this.repository.insertAnonymousSession(generateSessionId(), this.clock());
            if (started) {
                log.debug({ sessionId: started.session.id }, 'Anonymous session created');
                return started;
            }
        }
        throw new Error('Could not allocate an anonymous session id');
    }
}
