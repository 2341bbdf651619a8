import { AdminSessionStore, AuthService } from './authService';
import { verifyAdminToken, verifyPassword } from '../utils/auth';

jest.mock('../config/environment', () => ({
    config: {
        jwt: { secret: 'test-secret' },
        admin: { username: 'admin', password: 'test-password', sessionTtlSeconds: 3600 }
    }
}));

jest.mock('../utils/auth', () => ({
    ...jest.requireActual<typeof import('../utils/auth')>('../utils/auth'),
    verifyPassword: jest.fn()
}));

const mockVerifyPassword = verifyPassword as jest.MockedFunction<typeof verifyPassword>;

describe('AuthService', () => {
    let now: Date;
    let sessions: AdminSessionStore;
    let authService: AuthService;

    beforeEach(() => {
        now = new Date('2024-01-01T09:00:00Z');
        sessions = new AdminSessionStore(() => now);
        authService = new AuthService({ username: 'admin', password: 'test-password' }, sessions, 3600);
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('login', () => {
        it('should open a session and return a token for it', async () => {
            const result = await authService.login({ username: 'admin', password: 'test-password' });

            expect(result.success).toBe(true);
            expect(result.session).toMatchObject({
                username: 'admin',
                createdAt: new Date('2024-01-01T09:00:00Z'),
                expiresAt: new Date('2024-01-01T10:00:00Z')
            });
            expect(result.token).toBeDefined();
            expect(verifyAdminToken(result.token ?? '').sessionId).toBe(result.session?.id);
            expect(sessions.size).toBe(1);
        });

        it('should fail on a wrong password without opening a session', async () => {
            const result = await authService.login({ username: 'admin', password: 'nope' });

            expect(result).toEqual({ success: false, error: 'Invalid username or password.' });
            expect(sessions.size).toBe(0);
        });

        it('should fail on a wrong username', async () => {
            const result = await authService.login({ username: 'Admin', password: 'test-password' });

            expect(result.success).toBe(false);
            expect(result.error).toBe('Invalid username or password.');
        });

        it('should check against the bcrypt hash when one is configured', async () => {
            authService = new AuthService(
                { username: 'admin', password: 'ignored', passwordHash: 'test-hash' },
                sessions,
                3600
            );
            mockVerifyPassword.mockResolvedValueOnce(true);

            const result = await authService.login({ username: 'admin', password: 'test-password' });

            expect(result.success).toBe(true);
            expect(mockVerifyPassword).toHaveBeenCalledWith('test-password', 'test-hash');
        });

        it('should not fall back to the plain password when the hash does not match', async () => {
            authService = new AuthService(
                { username: 'admin', password: 'test-password', passwordHash: 'test-hash' },
                sessions,
                3600
            );
            mockVerifyPassword.mockResolvedValueOnce(false);

            const result = await authService.login({ username: 'admin', password: 'test-password' });

            expect(result.success).toBe(false);
        });
    });

    describe('sessions', () => {
        it('should end a session on logout', async () => {
            const { session } = await authService.login({ username: 'admin', password: 'test-password' });
            const sessionId = session?.id ?? '';

            expect(authService.getSession(sessionId)).not.toBeNull();
            expect(authService.logout(sessionId)).toBe(true);
            expect(authService.getSession(sessionId)).toBeNull();
            expect(authService.logout(sessionId)).toBe(false);
        });

        it('should expire a session after its lifetime', async () => {
            const { session } = await authService.login({ username: 'admin', password: 'test-password' });
            const sessionId = session?.id ?? '';

            now = new Date('2024-01-01T09:59:59Z');
            expect(authService.getSession(sessionId)).not.toBeNull();

            now = new Date('2024-01-01T10:00:00Z');
            expect(authService.getSession(sessionId)).toBeNull();
            expect(sessions.size).toBe(0);
        });

        it('should prune expired sessions when a new one opens', () => {
            sessions.create('admin', 60);
            now = new Date('2024-01-01T09:05:00Z');

            sessions.create('admin', 60);

            expect(sessions.size).toBe(1);
        });

        it('should keep sessions independent', async () => {
            const first = await authService.login({ username: 'admin', password: 'test-password' });
            const second = await authService.login({ username: 'admin', password: 'test-password' });

            authService.logout(first.session?.id ?? '');

            expect(authService.getSession(second.session?.id ?? '')).not.toBeNull();
        });
    });
});
