import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/environment';
import { generateAdminToken, verifyPassword } from '../utils/auth';

export interface LoginCredentials {
    username: string;
    password: string;
}

export interface AdminCredentials {
    username: string;
    password: string;
    passwordHash?: string;
}

/**
 * An authenticated admin. Created at login, gone after logout or expiry.
 */
export interface AdminSession {
    id: string;
    username: string;
    createdAt: Date;
    expiresAt: Date;
}

export interface LoginResult {
    success: boolean;
    session?: AdminSession;
    token?: string;
    error?: string;
}

/**
 * In-process registry of live admin sessions.
 */
export class AdminSessionStore {
    private readonly sessions = new Map<string, AdminSession>();

    constructor(private readonly now: () => Date = () => new Date()) { }

    create(username: string, ttlSeconds: number): AdminSession {
        this.pruneExpired();

        const createdAt = this.now();
        const session: AdminSession = {
            id: uuidv4(),
            username,
            createdAt,
            expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1000)
        };

        this.sessions.set(session.id, session);
        return session;
    }

    get(sessionId: string): AdminSession | null {
        const session = this.sessions.get(sessionId);
        if (!session) {
            return null;
        }

        if (session.expiresAt.getTime() <= this.now().getTime()) {
            this.sessions.delete(sessionId);
            return null;
        }

        return session;
    }

    destroy(sessionId: string): boolean {
        return this.sessions.delete(sessionId);
    }

    get size(): number {
        return this.sessions.size;
    }

    private pruneExpired(): void {
        const now = this.now().getTime();
        for (const [id, session] of this.sessions) {
            if (session.expiresAt.getTime() <= now) {
                this.sessions.delete(id);
            }
        }
    }
}

export const adminSessions = new AdminSessionStore();

export class AuthService {
    constructor(
        private readonly credentials: AdminCredentials = config.admin,
        private readonly sessions: AdminSessionStore = adminSessions,
        private readonly sessionTtlSeconds: number = config.admin.sessionTtlSeconds
    ) { }

    /**
     * Check the admin credential pair and open a session on success.
     */
    async login(credentials: LoginCredentials): Promise<LoginResult> {
        const { username, password } = credentials;

        if (!(await this.checkCredentials(username, password))) {
            return {
                success: false,
                error: 'Invalid username or password.'
            };
        }

        const session = this.sessions.create(username, this.sessionTtlSeconds);
        const token = generateAdminToken(session.id, session.username, this.sessionTtlSeconds);

        console.log(`Admin session ${session.id} opened for ${session.username}`);

        return {
            success: true,
            session,
            token
        };
    }

    async checkCredentials(username: string, password: string): Promise<boolean> {
        if (username !== this.credentials.username) {
            return false;
        }

        if (this.credentials.passwordHash) {
            return verifyPassword(password, this.credentials.passwordHash);
        }

        return password === this.credentials.password;
    }

    getSession(sessionId: string): AdminSession | null {
        return this.sessions.get(sessionId);
    }

    logout(sessionId: string): boolean {
        const ended = this.sessions.destroy(sessionId);
        if (ended) {
            console.log(`Admin session ${sessionId} closed`);
        }
        return ended;
    }
}
