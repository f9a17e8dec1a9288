import type { Alert } from "@exam-desk/schemas";
import type { EvaluationContext } from "./context.js";
import { isUberCaseD, isUberCaseE } from "./cases.js";

/**
 * Ancillary conditions surfaced in the outgoing message whatever state wins.
 * Alerts never change control flow.
 */
export function collectAlerts(context: Readonly<EvaluationContext>): Alert[] {
  const alerts: Alert[] = [];

  if (isUberCaseD(context)) {
    alerts.push({
      type: "uber_case_d",
      id: "U-D",
      title: "Compte Uber non vérifié",
      template: "uber_case_d_alert",
      position: "after_main",
      priority: "warning",
    });
  } else if (isUberCaseE(context)) {
    alerts.push({
      type: "uber_case_e",
      id: "U-E",
      title: "Non éligible selon Uber",
      template: "uber_case_e_alert",
      position: "after_main",
      priority: "warning",
    });
  }

  if (context.potentialPersonalAccount) {
    alerts.push({
      type: "personal_account",
      title: "Compte personnel potentiel détecté",
      position: "after_main",
      priority: "info",
    });
  }

  // A4: paid through the training centre account, personal account unpaid.
  if (context.personalAccountWarning) {
    alerts.push({
      type: "personal_account_warning",
      id: "A4",
      title: "Compte personnel détecté - utiliser le compte du centre",
      template: "partials/warnings/personal_account_warning",
      position: "before_signature",
      priority: "warning",
      personalAccountEmail: context.personalAccountEmail,
      cabAccountEmail: context.cabAccountEmail,
    });
  }

  return alerts;
}
