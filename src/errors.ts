/**
 * Error taxonomy for packaging runs.
 *
 * Every failure carries a machine-readable code plus the operation and subject
 * it was raised for. Nothing here is recovered locally: errors travel up to the
 * CLI, which prints the message and exits non-zero.
 */

export type StackpackErrorCode =
  | 'MALFORMED_MANIFEST'
  | 'UNSUPPORTED_MANIFEST_TYPE'
  | 'NO_PROJECT_IN_WORKSPACE'
  | 'NO_APPLICATIONS_FOUND'
  | 'UNKNOWN_APPLICATION'
  | 'ENVIRONMENT_LOOKUP'
  | 'ENVIRONMENT_NOT_FOUND'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_PARSE'
  | 'TEMPLATE_EXECUTION'
  | 'OUTPUT_IO'
  | 'WORKSPACE'
  | 'PROMPT'
  | 'CONFIG'

export class StackpackError extends Error {
  constructor(
    message: string,
    public readonly code: StackpackErrorCode,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'StackpackError'
  }
}

/**
 * Message of an arbitrary thrown value, for building wrapped error messages.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class MalformedManifestError extends StackpackError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MALFORMED_MANIFEST', cause)
    this.name = 'MalformedManifestError'
  }
}

export class UnsupportedManifestTypeError extends StackpackError {
  constructor(public readonly manifestType: string, supported: readonly string[]) {
    super(
      `Manifest type "${manifestType}" is not supported. Supported types: ${supported.join(', ')}`,
      'UNSUPPORTED_MANIFEST_TYPE'
    )
    this.name = 'UnsupportedManifestTypeError'
  }
}

export class NoProjectInWorkspaceError extends StackpackError {
  constructor() {
    super(
      'No project found: run this command inside a workspace, or pass --project',
      'NO_PROJECT_IN_WORKSPACE'
    )
    this.name = 'NoProjectInWorkspaceError'
  }
}

export class NoApplicationsFoundError extends StackpackError {
  constructor() {
    super(
      'There are no applications in the workspace, add an application manifest first',
      'NO_APPLICATIONS_FOUND'
    )
    this.name = 'NoApplicationsFoundError'
  }
}

export class UnknownApplicationError extends StackpackError {
  constructor(public readonly appName: string) {
    super(`Application "${appName}" does not exist in the workspace`, 'UNKNOWN_APPLICATION')
    this.name = 'UnknownApplicationError'
  }
}

export class EnvironmentLookupError extends StackpackError {
  constructor(
    message: string,
    cause?: unknown,
    code: 'ENVIRONMENT_LOOKUP' | 'ENVIRONMENT_NOT_FOUND' = 'ENVIRONMENT_LOOKUP'
  ) {
    super(message, code, cause)
    this.name = 'EnvironmentLookupError'
  }
}

export class TemplateNotFoundError extends StackpackError {
  constructor(public readonly templateName: string, cause?: unknown) {
    super(`Template "${templateName}" not found`, 'TEMPLATE_NOT_FOUND', cause)
    this.name = 'TemplateNotFoundError'
  }
}

export class TemplateParseError extends StackpackError {
  constructor(public readonly templateName: string, cause: unknown) {
    super(`Failed to parse template ${templateName}: ${describeError(cause)}`, 'TEMPLATE_PARSE', cause)
    this.name = 'TemplateParseError'
  }
}

export class TemplateExecutionError extends StackpackError {
  constructor(public readonly templateName: string, cause: unknown) {
    super(
      `Failed to execute template ${templateName}: ${describeError(cause)}`,
      'TEMPLATE_EXECUTION',
      cause
    )
    this.name = 'TemplateExecutionError'
  }
}

export class OutputIOError extends StackpackError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'OUTPUT_IO', cause)
    this.name = 'OutputIOError'
  }
}

export class WorkspaceError extends StackpackError {
  constructor(message: string, cause?: unknown) {
    super(message, 'WORKSPACE', cause)
    this.name = 'WorkspaceError'
  }
}

export class PromptError extends StackpackError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROMPT', cause)
    this.name = 'PromptError'
  }
}

export class ConfigError extends StackpackError {
  constructor(message: string) {
    super(message, 'CONFIG')
    this.name = 'ConfigError'
  }
}
