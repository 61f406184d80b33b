/**
 * Classification codes and their external mappings
 */

export { ErrorCode, type ErrorCodeType, isErrorCode } from './codes.js';
export {
  CodeTableError,
  CodeTablesSchema,
  type CodeTables,
  parseCodeTables,
  codeFromHttpStatus,
  codeToHttpStatus,
  codeFromIoKind,
  codeToIoKind,
  mappedHttpStatuses,
  mappedIoKinds
} from './tables.js';
