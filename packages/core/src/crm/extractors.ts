import type { ProposedExamDate, ProposedSession, SessionType } from "@exam-desk/schemas";
import { findDateMentions, frenchToIsoDate, toIsoDate } from "../utils/dates.js";
import { wholeWord } from "../utils/text.js";

// Session vocabulary, counted per side. A message mentioning both sides is
// ambiguous and never resolved by guessing.
export const SESSION_CHOICE_PATTERNS: Readonly<Record<SessionType, readonly RegExp[]>> = {
  jour: [
    wholeWord("cours du jour"),
    wholeWord("journ[ée]e"),
    wholeWord("matin(?:s|ée)?"),
    wholeWord("option\\s*1"),
    wholeWord("premi[èe]re option"),
    wholeWord("cdj"),
    wholeWord("jour"),
  ],
  soir: [
    wholeWord("cours du soir"),
    wholeWord("soir[ée]e"),
    wholeWord("soirs?"),
    wholeWord("option\\s*2"),
    wholeWord("(?:deuxi[èe]me|seconde) option"),
    wholeWord("cds"),
  ],
};

export type SessionPreferenceMatch =
  | { kind: "preference"; preference: SessionType; hits: number }
  | { kind: "ambiguous"; jour: number; soir: number }
  | { kind: "none" };

function countHits(text: string, patterns: readonly RegExp[]): number {
  return patterns.filter((pattern) => pattern.test(text)).length;
}

export function extractSessionPreference(message: string): SessionPreferenceMatch {
  const jour = countHits(message, SESSION_CHOICE_PATTERNS.jour);
  const soir = countHits(message, SESSION_CHOICE_PATTERNS.soir);

  if (jour > 0 && soir > 0) return { kind: "ambiguous", jour, soir };
  if (jour > 0) return { kind: "preference", preference: "jour", hits: jour };
  if (soir > 0) return { kind: "preference", preference: "soir", hits: soir };
  return { kind: "none" };
}

export function findSessionByType(
  sessions: readonly ProposedSession[],
  sessionType: SessionType,
): ProposedSession | undefined {
  return sessions.find((session) => session.sessionType === sessionType);
}

/** Distinct ISO dates written in the message, in order of first appearance. */
export function extractDates(message: string): string[] {
  return [...new Set(findDateMentions(message).map((mention) => mention.iso))];
}

export function proposedDateIso(proposed: ProposedExamDate): string | null {
  return toIsoDate(proposed.dateExamen) ?? frenchToIsoDate(proposed.dateExamen);
}

export type DateChoiceMatch =
  | { kind: "resolved"; date: string; proposed: ProposedExamDate }
  | { kind: "none" }
  | { kind: "not_proposed"; date: string }
  | { kind: "ambiguous"; dates: string[] };

/**
 * Resolves the message to exactly one offered exam date. Several dates are
 * narrowed down to the ones that were offered; anything other than a single
 * offered date is left unresolved.
 */
export function resolveDateChoice(
  message: string,
  proposedDates: readonly ProposedExamDate[],
): DateChoiceMatch {
  const dates = extractDates(message);
  if (dates.length === 0) return { kind: "none" };

  const offered = new Map<string, ProposedExamDate>();
  for (const proposed of proposedDates) {
    const iso = proposedDateIso(proposed);
    if (iso && !offered.has(iso)) offered.set(iso, proposed);
  }

  let candidates = dates;
  if (dates.length > 1) {
    candidates = dates.filter((date) => offered.has(date));
    if (candidates.length !== 1) return { kind: "ambiguous", dates };
  }

  const [date] = candidates;
  if (date === undefined) return { kind: "none" };
  const proposed = offered.get(date);
  if (!proposed) return { kind: "not_proposed", date };
  return { kind: "resolved", date, proposed };
}
