import type { ClassId } from "../core/shape";

export type AnalysisDiagnostic =
  | {
      type: "unsupported_operation";
      target: string;
      op: string;
      message: string;
    }
  | {
      type: "unsupported_call";
      target: string;
      callName: string;
    }
  | {
      type: "shape_conflict";
      target: string;
      previous: ClassId[];
      incoming: ClassId[];
    };

export function formatDiagnostic(diagnostic: AnalysisDiagnostic): string {
  switch (diagnostic.type) {
    case "unsupported_operation":
      return `can't find shape classes for ${diagnostic.target}: ${diagnostic.message}`;
    case "unsupported_call":
      return `unknown array call ${diagnostic.callName} assigned to ${diagnostic.target}`;
    case "shape_conflict":
      return `incompatible array shapes in control flow for ${diagnostic.target}: [${diagnostic.previous}] vs [${diagnostic.incoming}]`;
  }
}

export class DiagnosticRecorder {
  private readonly diagnostics: AnalysisDiagnostic[] = [];

  record(diagnostic: AnalysisDiagnostic): void {
    this.diagnostics.push(diagnostic);
    console.warn(`[array-analysis] ${formatDiagnostic(diagnostic)}`);
  }

  snapshot(): AnalysisDiagnostic[] {
    return this.diagnostics.slice();
  }
}
