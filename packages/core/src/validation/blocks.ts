import { escapeRegExp } from "../utils/text.js";

// Content blocks are recognised by any one of their patterns, case-insensitively.

export const REQUIRED_BLOCK_PATTERNS: Readonly<Record<string, readonly RegExp[]>> = {
  salutation: [/bonjour/iu, /cher/iu, /chère/iu, /madame/iu, /monsieur/iu],
  signature: [/cordialement/iu, /l['’]équipe/iu, /cab formations/iu, /bien à vous/iu],
  identifiants_examt3p: [/identifiant/iu, /mot de passe/iu, /intras\.fr/iu],
  warning_spam: [/spam/iu, /indésirable/iu, /courrier/iu],
  dates_proposees: [/\d{2}\/\d{2}\/\d{4}/u, /date.*examen/iu, /📅/u],
  call_to_action: [/merci de/iu, /veuillez/iu, /n['’]hésitez pas/iu, /contactez/iu],
  lien_plateforme: [/intras\.fr/iu, /https:\/\//iu],
  confirmation_choix: [/enregistré/iu, /confirmé/iu, /validé/iu],
  explication_probleme_identifiants: [
    /identifiants de connexion/iu,
    /plateforme examt3p/iu,
    /avons besoin de vos identifiants/iu,
  ],
  instructions_recuperation: [
    /retrouver vos identifiants/iu,
    /recherchez dans votre bo[îi]te mail/iu,
    /noreply@intras\.fr/iu,
  ],
  comprendre_besoin_identifiants: [
    /pourquoi.*besoin.*identifiants/iu,
    /chambre des m[ée]tiers/iu,
    /cma/iu,
    /paiement des frais/iu,
    /en votre nom/iu,
  ],
  alternative_autonomie: [
    /vous pr[ée]f[ée]rez.*vous-m[êe]me/iu,
    /c['’]est tout [àa] fait possible/iu,
    /voici la proc[ée]dure/iu,
    /241.*€/iu,
  ],
};

export const FORBIDDEN_BLOCK_PATTERNS: Readonly<Record<string, readonly RegExp[]>> = {
  dates_examen: [/date.*examen/iu, /examen.*\d{2}\/\d{2}/iu, /📅.*\d{2}\/\d{2}/u],
  sessions_formation: [/cours du jour/iu, /cours du soir/iu, /session.*formation/iu],
  identifiants: [/identifiant.*:/iu, /mot de passe.*:/iu],
  confirmation_inscription: [/inscription.*confirmée/iu, /bien inscrit/iu],
  dates_proposees: [/prochaines dates/iu, /dates disponibles/iu],
};

/** Unknown block names are looked up literally. */
export function blockPatterns(
  table: Readonly<Record<string, readonly RegExp[]>>,
  block: string,
): readonly RegExp[] {
  return table[block] ?? [new RegExp(escapeRegExp(block), "iu")];
}

export interface BlockMatch {
  pattern: RegExp;
  index: number;
  text: string;
}

export function findBlock(text: string, patterns: readonly RegExp[]): BlockMatch | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return { pattern, index: match.index, text: match[0] };
  }
  return null;
}
