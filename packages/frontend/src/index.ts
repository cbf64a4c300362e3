/**
 * icmpgen frontend - help-text parsing and name resolution
 */

export {
  type DiagnosticCode,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  oracleDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./help-text.js";
export * from "./listing.js";
export * from "./resolver.js";
