/**
 * Non-fatal: no inference rule exists for an expression. The driver catches
 * these, records a diagnostic and treats the target's shape as unknown.
 */
export class UnsupportedOperationError extends Error {
  name = "UnsupportedOperationError";

  constructor(
    readonly op: string,
    message: string,
  ) {
    super(message);
  }
}

export class UnsupportedCallError extends UnsupportedOperationError {
  name = "UnsupportedCallError";

  constructor(readonly callName: string) {
    super("call", `unknown array call: ${callName}`);
  }
}

/**
 * Fatal: the pass's own dispatch disagrees with the type map. These propagate
 * out of `ArrayAnalysis.run()`.
 */
export class PreconditionViolationError extends Error {
  name = "PreconditionViolationError";
}

export class UnknownVariableError extends PreconditionViolationError {
  name = "UnknownVariableError";

  constructor(readonly variable: string) {
    super(`no shape recorded for variable ${variable}`);
  }
}

export class MissingTypeError extends PreconditionViolationError {
  name = "MissingTypeError";

  constructor(readonly variable: string) {
    super(`no static type for variable ${variable}`);
  }
}

export class NoArrayOperandError extends PreconditionViolationError {
  name = "NoArrayOperandError";

  constructor(readonly operands: string[]) {
    super(`broadcast requires at least one array operand, got [${operands.join(", ")}]`);
  }
}

export class InvalidMergeError extends PreconditionViolationError {
  name = "InvalidMergeError";
}
