import {
  type AccessToken,
  type AuthConfig,
  type User,
  FALLBACK_TOKEN_EXPIRE_MINUTES,
  DuplicateUsernameError,
  InvalidCredentialsError,
  InvalidTokenError,
  UnknownSubjectError,
  InactiveUserError,
  isoNow,
} from '@tally/shared';
import type { UserRepository } from '@tally/store';
import { signJwt, verifyJwt } from './jwt.js';
import { hashPassword, verifyPassword } from './password.js';

/** One-way credential capability. */
export interface PasswordHasher {
  hash(password: string): string;
  verify(password: string, passwordHash: string): boolean;
}

export const scryptHasher: PasswordHasher = {
  hash: hashPassword,
  verify: verifyPassword,
};

export class Authenticator {
  constructor(
    private users: UserRepository,
    private authConfig: AuthConfig,
    private hasher: PasswordHasher = scryptHasher,
  ) {}

  register(username: string, password: string): User {
    if (this.users.getByUsername(username)) {
      throw new DuplicateUsernameError(username);
    }

    const user = this.users.create(username, this.hasher.hash(password), isoNow());
    // Lost a race against a concurrent registration of the same name
    if (!user) {
      throw new DuplicateUsernameError(username);
    }
    return user;
  }

  /** Absent user and wrong password fail identically. */
  login(username: string, password: string): AccessToken {
    const user = this.users.getByUsername(username);
    if (!user || !this.hasher.verify(password, user.passwordHash)) {
      throw new InvalidCredentialsError();
    }

    return {
      access_token: this.issueToken(user.username, this.authConfig.accessTokenExpireMinutes),
      token_type: 'bearer',
    };
  }

  issueToken(username: string, expiresInMinutes: number = FALLBACK_TOKEN_EXPIRE_MINUTES): string {
    return signJwt(username, this.authConfig.jwtSecret, expiresInMinutes * 60);
  }

  resolveIdentity(token: string): User {
    const claims = verifyJwt(token, this.authConfig.jwtSecret);
    if (!claims) {
      throw new InvalidTokenError();
    }

    const user = this.users.getByUsername(claims.sub);
    if (!user) {
      throw new UnknownSubjectError(claims.sub);
    }
    if (user.disabled) {
      throw new InactiveUserError();
    }
    return user;
  }
}
