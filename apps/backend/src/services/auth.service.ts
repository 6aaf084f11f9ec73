import * as argon2 from 'argon2';
import { eq, or } from 'drizzle-orm';
import type { UserProfile } from '@sharebox/shared';
import { MIN_PASSWORD_LENGTH } from '@sharebox/shared';
import type { Database } from '../db/index.js';
import { users } from '../db/schema/index.js';
import {
  conflict,
  internalError,
  isUniqueViolation,
  notFound,
  unauthorized,
  validationError,
} from '../utils/errors.js';
import { isUuid } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import { presenterService } from './presenter.service.js';

const logger = createLogger('AuthService');

const profileColumns = {
  id: users.id,
  username: users.username,
  email: users.email,
  createdAt: users.createdAt,
};

export interface AuthenticateResult {
  user: UserProfile;
}

export class AuthService {
  constructor(private readonly db: Database) {}

  async createUser(username: string, email: string, password: string): Promise<UserProfile> {
    const emailLower = email.toLowerCase();

    const existing = await this.db
      .select({ username: users.username, email: users.email })
      .from(users)
      .where(or(eq(users.username, username), eq(users.email, emailLower)))
      .limit(1);

    if (existing.length > 0) {
      throw conflict('Username or email already exists');
    }

    const passwordHash = await argon2.hash(password);

    try {
      const [created] = await this.db
        .insert(users)
        .values({ username, email: emailLower, passwordHash })
        .returning(profileColumns);

      if (!created) {
        throw internalError('Failed to create user');
      }

      logger.info({ userId: created.id, username }, 'User registered');
      return presenterService.toUserProfile(created);
    } catch (err) {
      // Lost a race with a concurrent registration
      if (isUniqueViolation(err)) {
        throw conflict('Username or email already exists');
      }
      throw err;
    }
  }

  /** `identifier` is either the username or the email address. */
  async authenticate(identifier: string, password: string): Promise<AuthenticateResult> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(or(eq(users.username, identifier), eq(users.email, identifier.toLowerCase())))
      .limit(1);

    if (!user) {
      // Consistent timing: still hash to avoid user enumeration
      await argon2.hash(password);
      throw unauthorized('Invalid credentials');
    }

    const valid = await argon2.verify(user.passwordHash, password);
    if (!valid) {
      throw unauthorized('Invalid credentials');
    }

    return { user: presenterService.toUserProfile(user) };
  }

  async validateSession(sessionToken: string): Promise<UserProfile> {
    // The session token is the signed user ID from the cookie; @fastify/cookie
    // has already verified the signature.
    if (!isUuid(sessionToken)) {
      throw unauthorized('Session is invalid or expired');
    }

    const [user] = await this.db
      .select(profileColumns)
      .from(users)
      .where(eq(users.id, sessionToken))
      .limit(1);

    if (!user) {
      throw unauthorized('Session is invalid or expired');
    }

    return presenterService.toUserProfile(user);
  }

  async changePassword(
    userId: string,
    currentPassword: string,
    newPassword: string,
    confirmPassword: string,
  ): Promise<void> {
    if (!currentPassword) {
      throw validationError('Current password is required', 'currentPassword');
    }
    if (newPassword !== confirmPassword) {
      throw validationError('New passwords do not match', 'confirmPassword');
    }
    if (newPassword.length < MIN_PASSWORD_LENGTH) {
      throw validationError(
        `New password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
        'newPassword',
      );
    }

    const [user] = await this.db
      .select({ passwordHash: users.passwordHash })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    if (!user) {
      throw notFound(`User ${userId} not found`);
    }

    const valid = await argon2.verify(user.passwordHash, currentPassword);
    if (!valid) {
      throw validationError('Current password is incorrect', 'currentPassword');
    }

    await this.db
      .update(users)
      .set({ passwordHash: await argon2.hash(newPassword) })
      .where(eq(users.id, userId));

    logger.info({ userId }, 'Password changed');
  }
}
