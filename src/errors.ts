export class IdentityToolError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The backing file could not be opened or does not hold identity data. */
export class StorageFaultError extends IdentityToolError {}

export class StoreError extends IdentityToolError {}

export class StoreTimeoutError extends StoreError {
  constructor(readonly timeoutMs: number, options?: ErrorOptions) {
    super(`identity store busy for more than ${timeoutMs}ms`, options);
  }
}

/** Input failed validation. */
export class ValidationError extends IdentityToolError {}

export class SettingsError extends ValidationError {
  constructor(readonly filePath: string, readonly issues: string[], options?: ErrorOptions) {
    super(`invalid settings in ${filePath}: ${issues.join('; ')}`, options);
  }
}

export class NotTrackedWorkspaceError extends IdentityToolError {
  constructor() {
    super('not inside a git repository (local set aborted)');
  }
}

/** git exited non-zero, could not be spawned or ran past its timeout. */
export class ExternalToolError extends IdentityToolError {
  constructor(readonly detail: string, options?: ErrorOptions) {
    super(detail, options);
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
