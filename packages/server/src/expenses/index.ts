export { ExpenseService } from './expense-service.js';
export type { ReportParams } from './expense-service.js';
export { buildExpenseQuery, dateWindow, parseCalendarDate } from './query-builder.js';
export type { DateWindow } from './query-builder.js';
export { summarizeByCategory } from './report.js';
