/**
 * Failure categories raised as exceptions.
 *
 * Policy content problems are never raised; they come back from the
 * validator as data. These codes cover caller mistakes and internal faults.
 */
export enum WardenErrorCode {
  /** The generated schema failed the draft-4 meta-schema check */
  SchemaInvalid = 'SCHEMA_INVALID',
  /** A policy file path does not exist */
  ConfigNotFound = 'CONFIG_NOT_FOUND',
  /** A policy file exists but is not valid YAML or JSON */
  PolicyUnparseable = 'POLICY_UNPARSEABLE',
  UnknownResource = 'UNKNOWN_RESOURCE',
  DuplicateRegistration = 'DUPLICATE_REGISTRATION',
}

export class WardenError extends Error {
  constructor(
    message: string,
    public readonly code: WardenErrorCode
  ) {
    super(message);
    this.name = 'WardenError';
  }
}

export function isWardenError(error: unknown, code?: WardenErrorCode): error is WardenError {
  return error instanceof WardenError && (code === undefined || error.code === code);
}
