import { describe, it, expect } from "vitest";
import type { DealRecord, TriageResult } from "@exam-desk/schemas";
import {
  StateDetector,
  buildEvaluationContext,
  extractDateCloture,
  extractDateExamen,
  extractDepartement,
  normalizeDetectionInput,
} from "../index.js";
import { TODAY, makeContext, makeInput, makeTestCatalog, silentLogger } from "./fixtures.js";

// Records arrive as JSON from the CRM and the triage step.
const dealFromJson = (json: string): DealRecord => JSON.parse(json);
const triageFromJson = (json: string): TriageResult => JSON.parse(json);

describe("exam date extraction", () => {
  it("reads the date from a lookup name", () => {
    expect(extractDateExamen({ Date_examen_VTC: { id: "5001", name: "93_2026-04-21" } })).toBe("2026-04-21");
  });

  it("reads a plain ISO string and drops the time part", () => {
    expect(extractDateExamen({ Date_examen_VTC: "2026-04-21T09:00:00+02:00" })).toBe("2026-04-21");
  });

  it("yields null for unreadable or impossible dates", () => {
    expect(extractDateExamen({ Date_examen_VTC: "bientôt" })).toBeNull();
    expect(extractDateExamen({ Date_examen_VTC: "2026-02-30" })).toBeNull();
    expect(extractDateExamen({ Date_examen_VTC: { id: "5001", name: "93_sans_date" } })).toBeNull();
    expect(extractDateExamen({})).toBeNull();
  });

  it("prefers the deal's own closing date over the lookup's", () => {
    const lookup = { id: "5001", name: "93_2026-04-21", Date_Cloture_Inscription: "2026-03-20" };
    expect(extractDateCloture({ Date_examen_VTC: lookup })).toBe("2026-03-20");
    expect(extractDateCloture({ Date_examen_VTC: lookup, Date_Cloture_Inscription: "2026-03-18" })).toBe(
      "2026-03-18",
    );
  });

  it("derives the department from the deposit office, else the lookup prefix", () => {
    expect(extractDepartement({ CMA_de_depot: "CMA 75" })).toBe("CMA 75");
    expect(extractDepartement({ CMA_de_depot: { id: "9", name: "CMA 93" } })).toBe("CMA 93");
    expect(extractDepartement({ Date_examen_VTC: { id: "5001", name: "93_2026-04-21" } })).toBe("93");
    expect(extractDepartement({})).toBeNull();
  });
});

describe("buildEvaluationContext", () => {
  it("computes the temporal facts against the injected day", () => {
    const ctx = makeContext({
      deal: { Date_examen_VTC: "2026-03-17", Date_Cloture_Inscription: "2026-03-01" },
    });
    expect(ctx.today).toBe(TODAY);
    expect(ctx.daysUntilExam).toBe(7);
    expect(ctx.dateExamenFuture).toBe(true);
    expect(ctx.dateExamenPassed).toBe(false);
    expect(ctx.cloturePassed).toBe(true);
    expect(ctx.hasExamDate).toBe(true);
  });

  it("treats the exam day itself as future", () => {
    const ctx = makeContext({ deal: { Date_examen_VTC: TODAY } });
    expect(ctx.daysUntilExam).toBe(0);
    expect(ctx.dateExamenFuture).toBe(true);
  });

  it("makes every temporal predicate false when dates are unknown", () => {
    const ctx = makeContext({ deal: { Date_examen_VTC: "n/a", Date_Cloture_Inscription: "??" } });
    expect(ctx.dateExamen).toBeNull();
    expect(ctx.daysUntilExam).toBeNull();
    expect(ctx.dateExamenFuture).toBe(false);
    expect(ctx.dateExamenPassed).toBe(false);
    expect(ctx.cloturePassed).toBe(false);
    expect(ctx.examDateCase).toBe(1);
  });

  it("falls back to the legacy intent field and defaults the triage action", () => {
    const ctx = buildEvaluationContext(
      { deal: {}, portal: {}, triage: { detected_intent: "STATUT_DOSSIER" }, linking: {} },
      TODAY,
    );
    expect(ctx.primaryIntent).toBe("STATUT_DOSSIER");
    expect(ctx.triageAction).toBe("GO");
    expect(ctx.secondaryIntents).toEqual([]);
    expect(ctx.threads).toEqual([]);
  });

  it("exposes force majeure sub-flags", () => {
    const ctx = makeContext({
      triage: {
        primary_intent: "REPORT_DATE",
        intent_context: { mentions_force_majeure: true, force_majeure_type: "medical" },
      },
    });
    expect(ctx.mentionsForceMajeure).toBe(true);
    expect(ctx.isForceMajeureMedical).toBe(true);
    expect(ctx.isForceMajeureDeath).toBe(false);
  });

  it("classifies the 20€ offer from amount and stage", () => {
    const won = makeContext({ deal: { Amount: 20, Stage: "GAGNÉ" } });
    expect(won.isUber20Deal).toBe(true);
    expect(won.uberCase).toBe("A");

    const pending = makeContext({ deal: { Amount: 20, Stage: "EN ATTENTE" } });
    expect(pending.isUberProspect).toBe(true);
    expect(pending.uberCase).toBe("PROSPECT");
  });

  it("only raises the personal account warning on a literal true", () => {
    expect(makeContext({ portal: { personal_account_warning: true } }).personalAccountWarning).toBe(true);
    expect(makeContext({ portal: { personal_account_warning: "possible" } }).personalAccountWarning).toBe(false);
  });

  it("stores rule B1 on the context", () => {
    const ctx = makeContext({
      deal: { Evalbox: "VALIDE CMA", Date_examen_VTC: "2026-03-24", Date_Cloture_Inscription: "2026-03-01" },
    });
    expect(ctx.canModifyExamDate).toBe(false);
    expect(ctx.examDateCase).toBe(4);
  });

  it("returns a frozen snapshot", () => {
    const ctx = makeContext();
    expect(Object.isFrozen(ctx)).toBe(true);
  });

  it("never throws on empty records", () => {
    expect(() => buildEvaluationContext(makeInput({ deal: { Amount: null, Stage: null } }), TODAY)).not.toThrow();
  });

  it("copies the caller's records", () => {
    const secondary = ["CONFIRMATION_SESSION"];
    const input = makeInput({ triage: { secondary_intents: secondary } });
    const ctx = buildEvaluationContext(input, TODAY);

    secondary.push("REPORT_DATE");
    input.deal.Evalbox = "VALIDE CMA";

    expect(ctx.secondaryIntents).toEqual(["CONFIRMATION_SESSION"]);
    expect(ctx.deal.Evalbox).toBe("Dossier Synchronisé");
  });
});

// ---------------------------------------------------------------------------
// Malformed records
// ---------------------------------------------------------------------------
describe("normalizeDetectionInput", () => {
  it("reads a non-string stage as missing", () => {
    const input = makeInput({ deal: dealFromJson('{"Amount": 20, "Stage": 7, "Evalbox": "VALIDE CMA"}') });

    const ctx = buildEvaluationContext(input, TODAY);
    expect(ctx.stage).toBe("");
    expect(ctx.isUber20Deal).toBe(false);
    expect(ctx.evalbox).toBe("VALIDE CMA");
    expect(ctx.amount).toBe(20);
  });

  it("ignores secondary intents that are not a list", () => {
    const input = makeInput({
      deal: { Date_examen_VTC: "2026-04-21" },
      triage: triageFromJson('{"action": "GO", "secondary_intents": "XCONFIRMATION_SESSIONX"}'),
    });

    expect(buildEvaluationContext(input, TODAY).secondaryIntents).toEqual([]);

    const detector = new StateDetector(makeTestCatalog(), { logger: silentLogger });
    const { allStates } = detector.detectAllStates(input, { today: TODAY });
    expect(allStates.map((s) => s.name)).not.toContain("CONFIRMATION_SESSION");
  });

  it("keeps the valid part of a force majeure context", () => {
    const { triage } = normalizeDetectionInput(
      makeInput({
        triage: triageFromJson(
          '{"primary_intent": "REPORT_DATE", "intent_context": {"mentions_force_majeure": true, "force_majeure_type": "weather"}}',
        ),
      }),
    );
    expect(triage.primary_intent).toBe("REPORT_DATE");
    expect(triage.intent_context).toEqual({ mentions_force_majeure: true });
  });

  it("replaces records that are not objects and drops unreadable messages", () => {
    const input = {
      ...makeInput(),
      portal: JSON.parse('"not a record"'),
      threads: [{ direction: "in" as const, text: "Bonjour" }, ...JSON.parse('[{"direction": "in"}, 3]')],
    };

    const normalized = normalizeDetectionInput(input);
    expect(normalized.portal).toEqual({});
    expect(normalized.threads).toEqual([{ direction: "in", text: "Bonjour" }]);
    expect(() => buildEvaluationContext(input, TODAY)).not.toThrow();
  });
});
