export type { User } from './types/user.js';
export type {
  Expense, CategoryTotals,
} from './types/expense.js';
export type { Category } from './types/category.js';
export type { AuthConfig, TokenClaims, AccessToken } from './types/auth.js';
export type {
  TallyConfig, ServerConfig, DatabaseConfig, LoggingConfig, LogLevel,
} from './types/config.js';

export {
  authConfigSchema, tokenClaimsSchema, registerRequestSchema, loginRequestSchema,
} from './schemas/auth.schema.js';
export {
  expenseInputSchema, paginationQuerySchema, expenseQuerySchema, reportQuerySchema, idParamSchema,
} from './schemas/expense.schema.js';
export type { ExpenseInputBody, ExpenseQueryParams } from './schemas/expense.schema.js';
export { categoryInputSchema } from './schemas/category.schema.js';
export {
  tallyConfigSchema, serverConfigSchema, databaseConfigSchema, loggingConfigSchema,
} from './schemas/config.schema.js';

export {
  VERSION,
  ACCESS_TOKEN_EXPIRE_MINUTES,
  FALLBACK_TOKEN_EXPIRE_MINUTES,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  UNCATEGORIZED_KEY,
  DEFAULT_CONFIG,
} from './constants.js';
export type { ConfigDefaults } from './constants.js';

export * from './utils/index.js';
