import type { Alert, DetectionInput, StateDefinition } from "@exam-desk/schemas";
import type { StateCatalog } from "../catalog/state-catalog.js";
import { createLogger, type Logger } from "../logger.js";
import { resolveToday } from "../utils/dates.js";
import { collectAlerts } from "./alerts.js";
import { buildEvaluationContext, type EvaluationContext } from "./context.js";
import { describeRule, evaluateRule } from "./rule-evaluator.js";
import type { DetectedState, DetectedStates, DetectOptions } from "./types.js";

export const GENERAL_STATE_NAME = "GENERAL";

/** Used when the catalog carries no GENERAL entry of its own. */
export const BUILTIN_GENERAL_STATE: StateDefinition = {
  id: "GENERAL",
  priority: 999,
  category: "general",
  severity: "INFO",
  description: "No specific state detected",
  detection: { method: "fallback" },
  workflow: { action: "RESPOND" },
  response: {
    template: "general",
    template_variants: [],
    blocks_required: ["salutation", "signature"],
    blocks_forbidden: [],
  },
};

export interface StateDetectorOptions {
  logger?: Logger;
  /** Source of "today" when a call does not pass one. */
  clock?: () => Date;
}

export class StateDetector {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly catalog: StateCatalog,
    options: StateDetectorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "state-detector" });
    this.clock = options.clock ?? (() => new Date());

    for (const entry of catalog.unsupportedEntries()) {
      this.logger.warn(
        { state: entry.name, methods: entry.methods },
        "Detection method not supported, state will never match",
      );
    }
  }

  /**
   * Evaluates every catalog entry in priority order. Only the first BLOCKING
   * match is kept; WARNING and INFO matches are all collected.
   */
  detectAllStates(input: DetectionInput, options: DetectOptions = {}): DetectedStates {
    const today = resolveToday(options.today ?? this.clock());
    const context = buildEvaluationContext(input, today);
    const alerts = collectAlerts(context);

    let blockingState: DetectedState | null = null;
    const warningStates: DetectedState[] = [];
    const infoStates: DetectedState[] = [];
    const allStates: DetectedState[] = [];

    for (const { name, definition } of this.catalog.states) {
      if (definition.severity === "BLOCKING" && blockingState) continue;

      const { detection } = definition;
      // A fallback only stands in for a missing primary state.
      if (detection.method === "fallback" && (blockingState || infoStates.length > 0)) continue;

      if (!evaluateRule(detection, context)) continue;

      const state = this.createDetectedState(name, definition, context, alerts);
      allStates.push(state);

      switch (definition.severity) {
        case "BLOCKING":
          blockingState = state;
          this.logger.info({ state: name, priority: definition.priority }, "Blocking state detected");
          break;
        case "WARNING":
          warningStates.push(state);
          this.logger.debug({ state: name }, "Warning state detected");
          break;
        case "INFO":
          infoStates.push(state);
          this.logger.debug({ state: name }, "Info state detected");
          break;
      }
    }

    if (!blockingState && infoStates.length === 0) {
      const definition = this.catalog.get(GENERAL_STATE_NAME) ?? BUILTIN_GENERAL_STATE;
      const general = this.createDetectedState(GENERAL_STATE_NAME, definition, context, alerts);
      infoStates.push(general);
      allStates.push(general);
    }

    const primaryState = blockingState ?? infoStates[0] ?? null;

    this.logger.info(
      {
        primary: primaryState?.name ?? null,
        blocking: blockingState?.name ?? null,
        warnings: warningStates.length,
        info: infoStates.length,
        alerts: alerts.length,
        uberCase: context.uberCase,
        examDateCase: context.examDateCase,
      },
      "Candidate states detected",
    );

    return { blockingState, warningStates, infoStates, primaryState, allStates };
  }

  /** Single-state entry point: the primary state of a full detection pass. */
  detectState(input: DetectionInput, options: DetectOptions = {}): DetectedState {
    const { primaryState } = this.detectAllStates(input, options);
    if (!primaryState) {
      // Unreachable: the pass always synthesizes GENERAL.
      throw new Error("Detection produced no primary state");
    }
    return primaryState;
  }

  private createDetectedState(
    name: string,
    definition: StateDefinition,
    context: Readonly<EvaluationContext>,
    alerts: Alert[],
  ): DetectedState {
    return {
      id: definition.id,
      name,
      priority: definition.priority,
      category: definition.category,
      severity: definition.severity,
      description: definition.description,
      workflowAction: definition.workflow.action,
      responseConfig: definition.response,
      crmUpdates: definition.crm_updates ?? null,
      detectionReason:
        definition.detection.method === "fallback" && name === GENERAL_STATE_NAME
          ? "No specific state detected"
          : `${name}: ${describeRule(definition.detection)}`,
      context,
      alerts: [...alerts],
      detectedIntent: context.primaryIntent,
      intentContext: context.intentContext,
    };
  }
}
