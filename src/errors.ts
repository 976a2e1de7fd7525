/**
 * Error handling for the sgRNA site pipeline
 *
 * Every failure the pipeline can attribute to a file, a line, a job or a
 * sample has its own class here, so callers can collect them into a run
 * report instead of aborting the whole run.
 */

/**
 * Base error class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PipelineError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid values
 */
export class ValidationError extends PipelineError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Invalid or missing configuration setting
 */
export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly setting?: string
  ) {
    super(message, "CONFIGURATION_ERROR", undefined, setting && `Setting: ${setting}`);
    this.name = "ConfigurationError";
  }
}

/**
 * Parsing errors for depth listings and aggregate tables
 */
export class ParseError extends PipelineError {
  constructor(
    message: string,
    public readonly format: "depth" | "aggregate",
    public readonly filePath: string,
    lineNumber?: number,
    public readonly line?: string
  ) {
    super(
      lineNumber === undefined ? `${filePath}: ${message}` : `${filePath}:${lineNumber}: ${message}`,
      "PARSE_ERROR",
      lineNumber,
      line === undefined ? undefined : `Line: ${JSON.stringify(line)}`
    );
    this.name = "ParseError";
  }
}

/**
 * File system errors with the path and operation that failed
 */
export class FileError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "scan" | "rename" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
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
      `${operation} failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("exdev")) {
      return "Output and working directories must be on the same filesystem";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }
}

/**
 * External program could not be started or exited unsuccessfully
 */
export class ToolError extends PipelineError {
  constructor(
    message: string,
    public readonly program: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message, "TOOL_ERROR", undefined, stderr === undefined || stderr === "" ? undefined : `stderr: ${stderr}`);
    this.name = "ToolError";
  }
}

export type JobFailureReason = "tool" | "missing-output" | "filesystem" | "collision";

/**
 * A failure attributed to exactly one job of a stage
 */
export class JobError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly sample: string,
    public readonly inputPath: string,
    public readonly reason: JobFailureReason,
    public readonly commandLine?: string,
    public override readonly cause?: unknown
  ) {
    super(`[${stage}] ${sample}: ${message}`, "JOB_ERROR", undefined, commandLine && `Command: ${commandLine}`);
    this.name = "JobError";
  }
}

/**
 * Two or more inputs of one stage derive the same sample name
 */
export class SampleCollisionError extends JobError {
  constructor(
    stage: string,
    sample: string,
    inputPath: string,
    public readonly collidingPaths: ReadonlyArray<string>
  ) {
    super(
      `sample name is shared by ${collidingPaths.length} inputs (${collidingPaths.join(", ")})`,
      stage,
      sample,
      inputPath,
      "collision"
    );
    this.name = "SampleCollisionError";
  }
}

/**
 * A sample's counts at the sites of interest sum to zero
 */
export class ZeroDenominatorError extends PipelineError {
  constructor(public readonly sample: string) {
    super(
      `Sample '${sample}' has no depth at any site of interest; proportions are undefined`,
      "ZERO_DENOMINATOR"
    );
    this.name = "ZeroDenominatorError";
  }
}

/**
 * Render any failure as a single line for logs and summary tables
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message.replace(/\s+/g, " ").trim();
  return String(error);
}
