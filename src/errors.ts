/**
 * Error handling for genotype resolution and the variant-calling pipeline
 *
 * Every failure the library raises extends {@link AllelicError} so callers can
 * branch on `code` without string matching. Effect programs carry these
 * classes in their typed error channel; the Promise API rejects with them.
 */

/**
 * Base error class for all allelic errors
 */
export class AllelicError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AllelicError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * A raw genotype token outside the allele alphabet
 */
export class InvalidGenotypeError extends AllelicError {
  constructor(
    message: string,
    public readonly token: string
  ) {
    super(message, "INVALID_GENOTYPE", `token: "${token}"`);
    this.name = "InvalidGenotypeError";
  }
}

/**
 * The SNP catalog could not be read, parsed or validated.
 *
 * Always fatal: a report over part of a catalog would silently drop entries.
 */
export class CatalogUnavailableError extends AllelicError {
  constructor(
    message: string,
    public readonly catalogPath: string,
    context?: string
  ) {
    super(message, "CATALOG_UNAVAILABLE", context);
    this.name = "CatalogUnavailableError";
  }
}

/**
 * A requested report section is not in the loaded catalog
 */
export class UnknownSectionError extends AllelicError {
  constructor(
    public readonly section: string,
    public readonly availableSections: readonly string[]
  ) {
    super(
      `Unknown section '${section}'. Available sections: ${availableSections.join(", ")}`,
      "UNKNOWN_SECTION"
    );
    this.name = "UnknownSectionError";
  }
}

/**
 * A flat genotype table whose header cannot be mapped onto the declared layout
 */
export class InvalidTableLayoutError extends AllelicError {
  constructor(
    message: string,
    public readonly tablePath: string,
    public readonly missingFields: readonly string[]
  ) {
    super(message, "INVALID_TABLE_LAYOUT", `missing fields: ${missingFields.join(", ")}`);
    this.name = "InvalidTableLayoutError";
  }
}

/**
 * An external tool exited unsuccessfully or could not be started
 */
export class ToolError extends AllelicError {
  constructor(
    message: string,
    public readonly commandLine: string,
    public readonly exitCode?: number,
    public readonly stderr?: string,
    code = "TOOL_FAILED"
  ) {
    super(message, code, `command: ${commandLine}`);
    this.name = "ToolError";
  }

  /**
   * Build the error for a process that ran and returned a nonzero status
   */
  static fromExit(commandLine: string, exitCode: number, stderr: string): ToolError {
    const tail = stderrTail(stderr);
    return new ToolError(
      `Command exited with status ${exitCode}${tail !== "" ? `: ${tail}` : ""}`,
      commandLine,
      exitCode,
      stderr
    );
  }

  /**
   * Build the error for a process that could not be spawned at all
   */
  static fromSystemError(commandLine: string, systemError: unknown): ToolError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = errorMessage.toLowerCase().includes("enoent")
      ? ". Check that the tool is installed and its path is configured"
      : "";
    return new ToolError(`Could not start command: ${errorMessage}${suggestion}`, commandLine);
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    return msg;
  }
}

/**
 * An external tool ran past its configured timeout and was killed
 */
export class ToolTimeoutError extends ToolError {
  constructor(
    commandLine: string,
    public readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms`, commandLine, undefined, undefined, "TOOL_TIMEOUT");
    this.name = "ToolTimeoutError";
  }
}

/**
 * A required input or reference file does not exist
 */
export class MissingInputError extends AllelicError {
  constructor(
    public readonly role: string,
    public readonly filePath: string
  ) {
    super(`${role} not found: ${filePath}`, "MISSING_INPUT");
    this.name = "MissingInputError";
  }
}

/**
 * A pipeline stage that could not produce its artifact
 */
export class StageError extends AllelicError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly failure?: unknown
  ) {
    super(
      `${stage}: ${message}`,
      "STAGE_FAILED",
      failure instanceof Error ? `${failure.name}: ${failure.message}` : undefined
    );
    this.name = "StageError";
  }
}

/**
 * Neither the combined table nor its package exists
 */
export class CombinedTableMissingError extends AllelicError {
  constructor(public readonly tablePath: string) {
    super(
      `Combined table not found: ${tablePath}. Run the variant-calling pipeline first`,
      "COMBINED_TABLE_MISSING"
    );
    this.name = "CombinedTableMissingError";
  }
}

/**
 * Invalid pipeline or reporter options
 */
export class ConfigurationError extends AllelicError {
  constructor(message: string, context?: string) {
    super(message, "INVALID_CONFIG", context);
    this.name = "ConfigurationError";
  }
}

/**
 * Packaging errors for zip archives and gzip streams
 */
export class CompressionError extends AllelicError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zip",
    public readonly operation: "compress" | "decompress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const hint = errorMessage.toLowerCase().includes("invalid")
      ? ". File may be corrupted or not actually " + format + " compressed"
      : "";
    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${hint}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends AllelicError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }
}

/**
 * Describe any thrown value in one line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function stderrTail(stderr: string, maxLines = 5): string {
  const lines = stderr
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
  return lines.slice(-maxLines).join(" | ");
}
