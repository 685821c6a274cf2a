/** Typed error categories emitted by tool execution stages. */
export type ToolErrorKind = 'validation' | 'execution';

/** A tool threw during execution. Raised out of the tool-call loop to the invoking worker. */
export class ToolExecutionError extends Error {
  readonly toolName: string;
  readonly kind: ToolErrorKind = 'execution';

  constructor(toolName: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}
