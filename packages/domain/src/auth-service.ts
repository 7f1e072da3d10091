import { type AdminProfile, toAdminProfile } from './admin';
import { TokenError } from './credential';
import { type AdminRepository, type PasswordHasher, type TokenService, type WithTransaction } from './ports';

export interface AuthServiceDeps {
  adminRepo: AdminRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  generateId: () => string;
  withTransaction: WithTransaction;
  registrationEnabled: boolean;
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  admin: AdminProfile;
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(input: { username: string; password: string }): Promise<AdminProfile> {
    const { adminRepo, passwordHasher, generateId } = this.deps;

    if (!this.deps.registrationEnabled) {
      throw new AuthError('FORBIDDEN', 'Admin registration is disabled');
    }

    return this.deps.withTransaction(async (tx) => {
      const existing = await adminRepo.findByUsername(tx, input.username);
      if (existing) {
        throw new AuthError('CONFLICT', `Admin '${input.username}' already exists`);
      }

      const passwordHash = await passwordHasher.hash(input.password);
      const admin = await adminRepo.create(tx, {
        id: generateId(),
        username: input.username,
        passwordHash,
      });
      return toAdminProfile(admin);
    });
  }

  async login(input: { username: string; password: string }): Promise<LoginResult> {
    const { adminRepo, passwordHasher, tokenService } = this.deps;

    const admin = await this.deps.withTransaction((tx) => adminRepo.findByUsername(tx, input.username));
    if (!admin) {
      throw new AuthError('UNAUTHORIZED', 'Invalid username or password');
    }

    const valid = await passwordHasher.verify(input.password, admin.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', 'Invalid username or password');
    }

    if (passwordHasher.needsRehash(admin.passwordHash)) {
      const upgraded = await passwordHasher.hash(input.password);
      await this.deps.withTransaction((tx) => adminRepo.updatePassword(tx, admin.id, upgraded));
    }

    const accessToken = await tokenService.issueAccessToken(admin.id, admin.username);
    const refreshToken = await tokenService.issueRefreshToken(admin.id);
    return { accessToken, refreshToken, admin: toAdminProfile(admin) };
  }

  /** Mints a new access token; the refresh token stays valid until it expires or is revoked. */
  async refresh(refreshToken: string): Promise<{ accessToken: string }> {
    const { adminRepo, tokenService } = this.deps;
    const accessToken = await tokenService.refreshAccess(refreshToken, async (adminId) => {
      const admin = await this.deps.withTransaction((tx) => adminRepo.findById(tx, adminId));
      if (!admin) {
        throw new AuthError('UNAUTHORIZED', 'Admin no longer exists');
      }
      return admin.username;
    });
    return { accessToken };
  }

  /**
   * The refresh token is checked before anything is revoked, so a rejected
   * logout leaves both tokens usable.
   */
  async logout(input: { adminId: string; accessToken: string; refreshToken?: string }): Promise<void> {
    const { tokenService } = this.deps;

    if (input.refreshToken !== undefined) {
      const refresh = await tokenService.inspect(input.refreshToken);
      if (refresh.kind !== 'refresh') {
        throw new TokenError('WRONG_KIND', `Expected refresh token, got ${refresh.kind} token`);
      }
      if (refresh.sub !== input.adminId) {
        throw new AuthError('FORBIDDEN', 'Refresh token belongs to another admin');
      }
    }

    await tokenService.revoke(input.accessToken);
    if (input.refreshToken !== undefined) {
      await tokenService.revoke(input.refreshToken);
    }
  }

  async getMe(adminId: string): Promise<AdminProfile | null> {
    const admin = await this.deps.withTransaction((tx) => this.deps.adminRepo.findById(tx, adminId));
    return admin ? toAdminProfile(admin) : null;
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'CONFLICT' | 'FORBIDDEN' | 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
