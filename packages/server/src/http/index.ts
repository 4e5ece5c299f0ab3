export { createErrorHandler } from './errors.js';
export { readJsonBody, readFormFields } from './request.js';
export { toUserResponse, toExpenseResponse, toCategoryResponse } from './serialize.js';
export type { UserResponse, ExpenseResponse } from './serialize.js';
