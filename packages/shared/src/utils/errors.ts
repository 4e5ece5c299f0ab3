export class TallyError extends Error {
  readonly status: number = 500;
  readonly kind: string = 'internal';

  constructor(message: string) {
    super(message);
    this.name = 'TallyError';
  }
}

export type IssueLocation = 'body' | 'query' | 'path';

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export class ValidationError extends TallyError {
  override readonly status = 422;
  override readonly kind: string = 'validation';

  constructor(public readonly issues: ValidationIssue[]) {
    super(`Validation failed: ${issues.map(i => `${i.loc.join('.')}: ${i.msg}`).join(', ')}`);
    this.name = 'ValidationError';
  }
}

export class InvalidFilterFormatError extends ValidationError {
  override readonly kind = 'invalid_filter_format';

  constructor(public readonly field: string, value: string) {
    super([{
      loc: ['query', field],
      msg: `Input should be a valid date in the format YYYY-MM-DD, got "${value}"`,
      type: 'date_parsing',
    }]);
    this.name = 'InvalidFilterFormatError';
  }
}

export class DuplicateUsernameError extends TallyError {
  override readonly status = 400;
  override readonly kind = 'duplicate_username';

  constructor(public readonly username: string) {
    super('Username already registered');
    this.name = 'DuplicateUsernameError';
  }
}

/** Base for every failure that must surface as 401 with a bearer challenge. */
export class AuthenticationError extends TallyError {
  override readonly status = 401;
  override readonly kind: string = 'not_authenticated';

  constructor(message = 'Could not validate credentials') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class InvalidCredentialsError extends AuthenticationError {
  override readonly kind = 'invalid_credentials';

  constructor() {
    super('Incorrect username or password');
    this.name = 'InvalidCredentialsError';
  }
}

export class InvalidTokenError extends AuthenticationError {
  override readonly kind = 'invalid_token';

  constructor() {
    super();
    this.name = 'InvalidTokenError';
  }
}

export class UnknownSubjectError extends AuthenticationError {
  override readonly kind = 'unknown_subject';

  constructor(public readonly subject: string) {
    super();
    this.name = 'UnknownSubjectError';
  }
}

export class InactiveUserError extends TallyError {
  override readonly status = 400;
  override readonly kind = 'inactive_user';

  constructor() {
    super('Inactive user');
    this.name = 'InactiveUserError';
  }
}

export class NotFoundError extends TallyError {
  override readonly status = 404;
  override readonly kind = 'not_found';

  constructor(public readonly resource: string) {
    super(`${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends TallyError {
  override readonly kind = 'config';

  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
