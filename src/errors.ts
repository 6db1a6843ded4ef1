export type ErrorCode =
  | "NOT_FOUND"
  | "MALFORMED_DOCUMENT"
  | "RULE_EVALUATION_FAILURE"
  | "COLLABORATOR_FAILURE";

export class GeocheckError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A referenced evidence, catalog or snippet document does not exist.
 */
export class EvidenceNotFoundError extends GeocheckError {
  readonly path: string;

  constructor(path: string) {
    super("NOT_FOUND", `Evidence file not found: ${path}`);
    this.path = path;
  }
}

export class MalformedDocumentError extends GeocheckError {
  readonly path: string;
  readonly problems: readonly string[];

  constructor(path: string, problems: readonly string[], options?: ErrorOptions) {
    super(
      "MALFORMED_DOCUMENT",
      `Malformed document ${path}: ${problems.join("; ")}`,
      options,
    );
    this.path = path;
    this.problems = problems;
  }
}

/**
 * Raised while turning a raw logic document into an expression tree.
 */
export class LogicParseError extends GeocheckError {
  constructor(message: string) {
    super("RULE_EVALUATION_FAILURE", message);
  }
}

export class RuleEvaluationError extends GeocheckError {
  constructor(message: string) {
    super("RULE_EVALUATION_FAILURE", message);
  }
}

export class CollaboratorError extends GeocheckError {
  constructor(message: string, options?: ErrorOptions) {
    super("COLLABORATOR_FAILURE", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeError(
  error: unknown,
  code: string,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && error.code === code;
}
