export { Authenticator, scryptHasher } from './authenticator.js';
export type { PasswordHasher } from './authenticator.js';
export { hashPassword, verifyPassword } from './password.js';
export { signJwt, verifyJwt } from './jwt.js';
export { authMiddleware } from './middleware.js';
export { authorize } from './ownership.js';
export type { Authorization } from './ownership.js';
