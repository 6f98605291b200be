export class RepoCheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepoCheckError";
  }
}

export class ConfigError extends RepoCheckError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ScanError extends RepoCheckError {
  constructor(
    message: string,
    public readonly root: string,
  ) {
    super(message);
    this.name = "ScanError";
  }
}

/** A git check that ran but could not be classified. */
export class InspectionError extends RepoCheckError {
  constructor(message: string) {
    super(message);
    this.name = "InspectionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
