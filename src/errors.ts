/**
 * Error taxonomy for page operations.
 *
 * Callers branch on `kind` rather than on message text:
 * - validation: bad input caught locally, before any request is made
 * - remote:     the Graph API answered with something other than success
 * - timeout:    an async operation never reached a terminal state
 * - auth:       no usable token, or the API rejected a freshly refreshed one
 *
 * A 503 while polling an operation is not represented here; the transfer
 * state machine treats it as "still running".
 */

export type OneNoteErrorKind = "validation" | "remote" | "timeout" | "auth";

export abstract class OneNoteError extends Error {
  abstract readonly kind: OneNoteErrorKind;

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, name: this.name, message: this.message };
  }
}

export class ValidationError extends OneNoteError {
  readonly kind = "validation" as const;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Raised when update commands target individual table cells or rows.
 * The message carries the remediation for the calling agent.
 */
export class TableUpdateError extends ValidationError {
  readonly targets: string[];

  constructor(targets: string[]) {
    super(
      `TABLE UPDATE RESTRICTION: You are attempting to update individual table elements (${targets.join(", ")}).\n` +
        "\n" +
        "OneNote requires that tables be updated as complete units, not individual cells or rows.\n" +
        "\n" +
        "SOLUTION: Instead of updating individual table elements, you must:\n" +
        "1. Target the entire table element (table:{table-data-id})\n" +
        "2. Replace the complete table HTML with your updated content\n" +
        "3. Include all table structure (table, tr, td/th elements) in your replacement\n" +
        "\n" +
        "Example of CORRECT approach:\n" +
        '- Target: "table:{table-data-id}"\n' +
        '- Action: "replace"\n' +
        '- Content: "<table>...complete table HTML...</table>"\n' +
        "\n" +
        "Example of INCORRECT approach (what you're doing):\n" +
        '- Target: "td:{cell-data-id}"\n' +
        '- Action: "replace"\n' +
        '- Content: "<td>new content</td>"',
    );
    this.name = "TableUpdateError";
    this.targets = targets;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), targets: this.targets };
  }
}

/**
 * Raised when a page title or other display name contains a character the
 * service does not accept. `suggestion` has every illegal character replaced.
 */
export class InvalidNameError extends ValidationError {
  readonly character: string;
  readonly suggestion: string;

  constructor(label: string, character: string, replacement: string, suggestion: string, illegal: string) {
    super(
      `${label} contains illegal character '${character}'. Illegal characters are: ${illegal}\n` +
        "\n" +
        `Suggestion: Try using '${replacement}' instead of '${character}'.\n` +
        "\n" +
        `Suggested valid ${label}: '${suggestion}'`,
    );
    this.name = "InvalidNameError";
    this.character = character;
    this.suggestion = suggestion;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), character: this.character, suggestion: this.suggestion };
  }
}

export class RemoteError extends OneNoteError {
  readonly kind = "remote" as const;
  /** Name of the operation that failed, e.g. "UpdatePageContent". */
  readonly operation: string;
  /** HTTP status, or 0 when the status was fine but the payload was not. */
  readonly status: number;
  readonly body: string;

  constructor(operation: string, status: number, body: string, detail?: string) {
    const suffix = detail ?? (body ? `HTTP ${status} - ${body}` : `HTTP ${status}`);
    super(`${operation} failed: ${suffix}`);
    this.name = "RemoteError";
    this.operation = operation;
    this.status = status;
    this.body = body;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation, status: this.status, body: this.body };
  }
}

export class OperationTimeoutError extends OneNoteError {
  readonly kind = "timeout" as const;
  readonly operationId: string;
  readonly attempts: number;

  constructor(operationId: string, attempts: number) {
    super(`operation ${operationId} did not complete within ${attempts} attempts`);
    this.name = "OperationTimeoutError";
    this.operationId = operationId;
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operationId: this.operationId, attempts: this.attempts };
  }
}

export class AuthError extends OneNoteError {
  readonly kind = "auth" as const;

  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * Extract a string message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
