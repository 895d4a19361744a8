import { DiagnosticError, type Diagnostic } from "../diagnostics/index.js";

/** Runs `run` and returns the diagnostic it throws. */
export const diagnosticOf = (run: () => unknown): Diagnostic => {
  try {
    run();
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return error.diagnostic;
    }
    throw error;
  }
  throw new Error("expected a DiagnosticError");
};
