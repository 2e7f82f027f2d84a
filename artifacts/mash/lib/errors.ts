/**
 * Raised when the inputs (or what is already on disk) are not consistent with
 * the run being asked for. These are never retried - the caller needs to fix
 * the condition (remove a stale sketch, choose another output folder etc).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised when an invocation of the mash binary fails (could not be started,
 * exited non-zero, or did not produce the file we expected).
 */
export class ExternalToolError extends Error {
  constructor(
    message: string,
    readonly args: string[],
    readonly exitCode: number | null,
    readonly diagnostics: string
  ) {
    super(diagnostics ? `${message}\n${diagnostics}` : message);
    this.name = "ExternalToolError";
  }
}
