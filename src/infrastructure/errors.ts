/**
 * Base class for every failure that aborts a backup run.
 */
export class BackupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unusable configuration: variables, executables, retention value. */
export class ConfigurationError extends BackupError {}

export class ToolFailureError extends BackupError {
  constructor(
    readonly tool: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(`${tool} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`);
  }
}

/** The tool reported success but the file it should have written is not there. */
export class ArtifactVerificationError extends BackupError {
  constructor(readonly artifactPath: string) {
    super(`Expected artifact was not written: ${artifactPath}`);
  }
}
