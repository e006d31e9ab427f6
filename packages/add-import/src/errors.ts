/**
 * Add-Import Package - Errors
 */

/** Error codes */
export const AddImportErrorCode = {
  USAGE_NO_FILES: "ADD_IMPORT_USAGE_NO_FILES",
  USAGE_NO_FQN: "ADD_IMPORT_USAGE_NO_FQN",
  USAGE_UNKNOWN_OPTION: "ADD_IMPORT_USAGE_UNKNOWN_OPTION",
  USAGE_MISSING_VALUE: "ADD_IMPORT_USAGE_MISSING_VALUE",
  WRITE_FAILED: "ADD_IMPORT_WRITE_FAILED",
} as const;

export type AddImportErrorCodeType = (typeof AddImportErrorCode)[keyof typeof AddImportErrorCode];

/**
 * Error that ends the whole invocation with exit code 1.
 */
export class AddImportError extends Error {
  constructor(
    message: string,
    public readonly code: AddImportErrorCodeType,
    public readonly file?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AddImportError";
  }
}
