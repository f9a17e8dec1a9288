import type {
  Alert,
  CrmUpdateRule,
  IntentContext,
  ResponseConfig,
  Severity,
  WorkflowAction,
} from "@exam-desk/schemas";
import type { EvaluationContext } from "./context.js";

/** One catalog entry matched against one evaluation context. */
export interface DetectedState {
  id: string;
  name: string;
  priority: number;
  category: string;
  severity: Severity;
  description: string;
  workflowAction: WorkflowAction;
  responseConfig: ResponseConfig;
  crmUpdates: CrmUpdateRule | null;
  detectionReason: string;
  context: Readonly<EvaluationContext>;
  alerts: Alert[];
  detectedIntent: string | null;
  intentContext: IntentContext;
}

export interface DetectedStates {
  blockingState: DetectedState | null;
  warningStates: DetectedState[];
  infoStates: DetectedState[];
  /** `blockingState`, else the first INFO state. */
  primaryState: DetectedState | null;
  allStates: DetectedState[];
}

export interface DetectOptions {
  /** ISO day or Date; defaults to the detector's clock. */
  today?: Date | string;
}
