export interface AuthConfig {
  jwtSecret: string;
  accessTokenExpireMinutes: number;
}

/** Claim set signed into an access token. */
export interface TokenClaims {
  sub: string;
  iat?: number;
  exp: number;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}
