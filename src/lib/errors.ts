/** Error categories for devstrap */
export const ErrorCode = {
  // Manifest errors
  MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',
  MANIFEST_PARSE_ERROR: 'MANIFEST_PARSE_ERROR',
  MANIFEST_VALIDATION_ERROR: 'MANIFEST_VALIDATION_ERROR',
  UNKNOWN_GROUP: 'UNKNOWN_GROUP',

  // Credential errors
  CREDENTIAL_FILE_INVALID: 'CREDENTIAL_FILE_INVALID',

  // Step errors (recorded on results, not thrown out of a run)
  STEP_FAILED: 'STEP_FAILED',
  STEP_TIMEOUT: 'STEP_TIMEOUT',
  COMMAND_NOT_FOUND: 'COMMAND_NOT_FOUND',
  UNRESOLVED_VARIABLE: 'UNRESOLVED_VARIABLE',

  // Settings merge errors
  SETTINGS_NOT_FOUND: 'SETTINGS_NOT_FOUND',
  SETTINGS_PARSE_ERROR: 'SETTINGS_PARSE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes that mean the run was misconfigured and no step should start */
export const CONFIGURATION_ERROR_CODES: readonly ErrorCode[] = [
  ErrorCode.MANIFEST_NOT_FOUND,
  ErrorCode.MANIFEST_PARSE_ERROR,
  ErrorCode.MANIFEST_VALIDATION_ERROR,
  ErrorCode.UNKNOWN_GROUP,
  ErrorCode.CREDENTIAL_FILE_INVALID,
];

/** devstrap error with code and optional remediation hint */
export class DevstrapError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'DevstrapError';
  }

  get isConfigurationError(): boolean {
    return CONFIGURATION_ERROR_CODES.includes(this.code);
  }
}
