export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export { readCsvHeadings, extractColumnValues, readCsvTable, writeCsvTable, serializeCsvTable } from './csv';
export type { CsvTable } from './csv';
export {
  sanitizeStagedName,
  sanitizeFilename,
  formatFileTimestamp,
  resolveNameCollision,
} from './filename';
