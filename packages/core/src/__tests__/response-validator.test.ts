import { describe, it, expect } from "vitest";
import { ResponseValidator, StateDetector, type DetectedState } from "../index.js";
import { TODAY, makeInput, makeTestCatalog, silentLogger, type InputOverrides } from "./fixtures.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const catalog = makeTestCatalog();
const detector = new StateDetector(catalog, { logger: silentLogger });

function stateNamed(name: string, overrides: InputOverrides = {}): DetectedState {
  const { allStates } = detector.detectAllStates(makeInput(overrides), { today: TODAY });
  const state = allStates.find((s) => s.name === name);
  if (!state) throw new Error(`State ${name} not detected`);
  return state;
}

const convocation = () =>
  stateNamed("CONVOCATION_RECEIVED", {
    deal: {
      Evalbox: "Convoc CMA reçue",
      Date_examen_VTC: "2026-03-24",
      Date_Cloture_Inscription: "2026-03-20",
      Email: "candidat@example.test",
    },
    portal: { identifiant: "candidat@example.test" },
  });

// Synchronized dossier with an exam on 2026-04-21: nothing but GENERAL matches.
const general = () => stateNamed("GENERAL", { deal: { Date_examen_VTC: "2026-04-21" } });

function makeValidator(options: { minLength?: number; maxLength?: number; extraForbiddenTerms?: string[] } = {}) {
  return new ResponseValidator({ catalog, logger: silentLogger, ...options });
}

const wrap = (body: string) => `Bonjour,\n\n${body}\n\nCordialement,\nL'équipe`;

const ALL_CHECKS = [
  "forbidden_terms",
  "required_blocks",
  "forbidden_blocks",
  "dates_coherence",
  "identifiers_check",
  "amounts_check",
  "format_check",
];

// ---------------------------------------------------------------------------
// 1. Overall result
// ---------------------------------------------------------------------------
describe("ResponseValidator.validate", () => {
  it("passes a clean reply with every check recorded", () => {
    const text = wrap(
      "Votre convocation pour l'examen du 24/03/2026 est disponible sur https://www.intras.fr.\n" +
        "Identifiant : candidat@example.test",
    );

    expect(makeValidator().validate(text, convocation())).toEqual({
      valid: true,
      errors: [],
      warnings: [],
      checksPassed: ALL_CHECKS,
    });
  });

  it("fails on the offer price and on leftover placeholders", () => {
    const text =
      "Bonjour {{prenom}},\n\nLes frais de 20€ sont pris en charge par votre centre de formation.\n\nCordialement,\nL'équipe";
    const result = makeValidator().validate(text, general());

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.type, e.message])).toEqual([
      ["forbidden_term", "Forbidden term found: '20€'"],
      ["forbidden_amount", "Amount 20€ must not be quoted (offer price)"],
      ["unresolved_placeholder", "Unresolved placeholders: {{prenom}}"],
    ]);
    expect(result.checksPassed).toEqual(["required_blocks", "forbidden_blocks", "dates_coherence", "identifiers_check"]);
  });

  it("keeps a reply valid when it only has warnings", () => {
    const result = makeValidator().validate("Salut", general());

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.type)).toEqual(["too_short", "missing_greeting", "missing_closing"]);
    expect(result.warnings[0]?.message).toBe("Response shorter than 50 characters (5)");
  });
});

// ---------------------------------------------------------------------------
// 2. Forbidden terms
// ---------------------------------------------------------------------------
describe("forbidden terms", () => {
  it("merges built-in, catalog and extra terms without duplicates", () => {
    const validator = makeValidator({ extraForbiddenTerms: ["montreuil", "ExamT3P"] });
    expect(validator.forbiddenTerms).toContain("Zoho");
    expect(validator.forbiddenTerms).toContain("ExamT3P");
    expect(validator.forbiddenTerms.filter((t) => t.toLowerCase() === "montreuil")).toEqual(["Montreuil"]);
  });

  it("matches whole words only, whatever the case", () => {
    const validator = makeValidator();

    const flagged = validator.validate(wrap("Votre fiche zoho est à jour."), general());
    expect(flagged.errors.map((e) => e.message)).toEqual(["Forbidden term found: 'Zoho'"]);

    const clean = validator.validate(wrap("Un parcours idéal en plusieurs modules de révision."), general());
    expect(clean.errors).toEqual([]);
    expect(clean.checksPassed).toContain("forbidden_terms");
  });
});

// ---------------------------------------------------------------------------
// 3. Content blocks
// ---------------------------------------------------------------------------
describe("content blocks", () => {
  const noLink = wrap("Votre date d'examen ne peut plus être modifiée après la clôture des inscriptions.");

  it("requires the state's blocks", () => {
    const result = makeValidator().validate(noLink, convocation());
    expect(result.errors).toEqual([
      { type: "missing_block", severity: "error", message: "Required block missing: 'lien_plateforme'" },
    ]);
    expect(result.checksPassed).not.toContain("required_blocks");
  });

  it("rejects a block the state forbids", () => {
    const state = convocation();
    const forbidding = {
      ...state,
      responseConfig: { ...state.responseConfig, blocks_forbidden: ["dates_proposees"] },
    };
    const text = wrap("Voici les prochaines dates disponibles sur https://www.intras.fr.");

    const result = makeValidator().validate(text, forbidding);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        type: "forbidden_block",
        severity: "error",
        message: "Forbidden block present: 'dates_proposees'",
        location: "...Bonjour,\n\nVoici les prochaines dates disponibles sur htt...",
      },
    ]);
    expect(result.checksPassed).toEqual(ALL_CHECKS.filter((check) => check !== "forbidden_blocks"));
  });

  it("skips required blocks when an override template produced the reply", () => {
    const result = makeValidator().validate(noLink, convocation(), { templateUsed: "report_bloque" });
    expect(result.valid).toBe(true);
    expect(result.checksPassed).toEqual(ALL_CHECKS.filter((check) => check !== "required_blocks"));
  });
});

// ---------------------------------------------------------------------------
// 4. Dates
// ---------------------------------------------------------------------------
describe("date coherence", () => {
  it("warns once per unknown date and flags past ones", () => {
    const text = wrap("Dates : 21/04/2026, 19 mai 2026, 05/05/2026 et 1er mars 2026. Rappel : 21/04/2026.");
    const result = makeValidator().validate(text, general(), {
      proposedDates: [{ id: "ed-2", dateExamen: "2026-05-19" }],
    });

    expect(result.warnings.map((w) => [w.type, w.message])).toEqual([
      ["invented_date", "Possibly invented date: '05/05/2026'"],
      ["invented_date", "Possibly invented date: '1er mars 2026'"],
      ["past_date", "Past date mentioned: '1er mars 2026'"],
    ]);
    expect(result.valid).toBe(true);
    expect(result.checksPassed).not.toContain("dates_coherence");
  });
});

// ---------------------------------------------------------------------------
// 5. Identifiers
// ---------------------------------------------------------------------------
describe("identifiers", () => {
  it("warns about an unknown email on a login line only", () => {
    const text = wrap(
      "Identifiant : autre@example.test\nPour toute question, écrivez à support@example.test sur https://www.intras.fr",
    );
    const result = makeValidator().validate(text, convocation());

    expect(result.warnings).toEqual([
      {
        type: "wrong_identifier",
        severity: "warning",
        message: "Possibly wrong identifier: 'autre@example.test'",
        location: "Identifiant : autre@example.test",
      },
    ]);
  });

  it("skips the check when no identifier is known", () => {
    const result = makeValidator().validate(wrap("Identifiant : quelqu.un@example.test"), general());
    expect(result.checksPassed).toContain("identifiers_check");
  });
});

// ---------------------------------------------------------------------------
// 6. Amounts
// ---------------------------------------------------------------------------
describe("amounts", () => {
  const text = wrap("Les frais d'examen sont de 241 €, les frais de dossier de 60 euros, la révision 95€ et le café 5€.");

  it("accepts the standard fees and warns on other amounts", () => {
    const result = makeValidator().validate(text, general());
    expect(result.warnings.map((w) => w.message)).toEqual(["Unusual amount: 95€"]);
    expect(result.errors).toEqual([]);
  });

  it("recognises the EUR notation", () => {
    const result = makeValidator().validate(wrap("Les frais de 20 EUR restent à votre charge."), general());
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.message)).toEqual(["Amount 20€ must not be quoted (offer price)"]);
  });

  it("accepts amounts the caller allows", () => {
    const result = makeValidator().validate(text, general(), { allowedAmounts: [95] });
    expect(result.checksPassed).toContain("amounts_check");
  });
});

// ---------------------------------------------------------------------------
// 7. Format
// ---------------------------------------------------------------------------
describe("format", () => {
  it("uses the configured maximum length", () => {
    const text = `Bonjour,\n${"a".repeat(120)}\nCordialement`;
    const result = makeValidator({ minLength: 10, maxLength: 100 }).validate(text, general());

    expect(result.warnings).toEqual([
      { type: "too_long", severity: "warning", message: "Response longer than 100 characters (142)" },
    ]);
  });

  it("looks for the sign-off at the end only", () => {
    const text = `Bonjour, cordialement vôtre.\n${"Une précision sur votre dossier. ".repeat(10)}`;
    const result = makeValidator().validate(text, general());
    expect(result.warnings.map((w) => w.type)).toEqual(["missing_closing"]);
  });
});
