import { evaluateRule, hasIntent } from "../engine/rule-evaluator.js";
import type { DetectedState } from "../engine/types.js";
import { OVERRIDE_INTENTS, OVERRIDE_TEMPLATES, RESCHEDULE_INTENTS } from "./overrides.js";

export type TemplateSource = "override" | "variant" | "default";

export interface TemplateSelection {
  template: string;
  source: TemplateSource;
  reason: string;
}

function selectOverride(state: DetectedState): TemplateSelection | null {
  const { context } = state;

  const reschedule = RESCHEDULE_INTENTS.find((intent) => hasIntent(context, intent));
  if (reschedule && !context.canModifyExamDate) {
    const withForceMajeure = context.mentionsForceMajeure || context.forceMajeureType !== null;
    return {
      template: withForceMajeure
        ? OVERRIDE_TEMPLATES.rescheduleBlockedForceMajeure
        : OVERRIDE_TEMPLATES.rescheduleBlocked,
      source: "override",
      reason: `${reschedule} while exam date is locked (${context.evalbox})`,
    };
  }

  if (hasIntent(context, OVERRIDE_INTENTS.refusPartageCredentials)) {
    return {
      template: OVERRIDE_TEMPLATES.credentialsRefusedSecurity,
      source: "override",
      reason: `${OVERRIDE_INTENTS.refusPartageCredentials} intent`,
    };
  }

  return null;
}

/**
 * Resolves the template a detected state is rendered with: intent overrides
 * first, then the first matching variant, then the state's own template.
 */
export function selectTemplate(state: DetectedState): TemplateSelection {
  const override = selectOverride(state);
  if (override) return override;

  for (const variant of state.responseConfig.template_variants) {
    if (evaluateRule(variant.when, state.context)) {
      return { template: variant.template, source: "variant", reason: "template variant matched" };
    }
  }

  return { template: state.responseConfig.template, source: "default", reason: "state template" };
}
