import type { CatalogDocument, DetectionRule, StateDefinition } from "@exam-desk/schemas";

export interface CatalogEntry {
  name: string;
  definition: StateDefinition;
}

/** Every `unsupported` node in a rule tree, with its declared method. */
export function findUnsupportedMethods(rule: DetectionRule): string[] {
  switch (rule.method) {
    case "unsupported":
      return [rule.declaredMethod];
    case "all_of":
    case "any_of":
      return rule.rules.flatMap(findUnsupportedMethods);
    case "not":
      return findUnsupportedMethods(rule.rule);
    default:
      return [];
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Loaded, validated and frozen catalog. One instance is shared by every
 * detector, updater and validator of the process.
 */
export class StateCatalog {
  readonly version: string;
  readonly states: readonly CatalogEntry[];
  readonly forbiddenTerms: readonly string[];
  readonly requiredBlocksGlobal: readonly string[];
  private readonly byName: ReadonlyMap<string, StateDefinition>;
  private readonly byId: ReadonlyMap<string, StateDefinition>;

  constructor(document: CatalogDocument) {
    const frozen = deepFreeze(structuredClone(document));
    this.version = frozen.version;
    this.forbiddenTerms = frozen.config.forbidden_terms;
    this.requiredBlocksGlobal = frozen.config.required_blocks_global;

    const entries = Object.entries(frozen.states).map(([name, definition]) => ({ name, definition }));
    entries.sort((a, b) =>
      a.definition.priority - b.definition.priority || a.name.localeCompare(b.name),
    );
    this.states = Object.freeze(entries);
    this.byName = new Map(entries.map((e) => [e.name, e.definition]));
    this.byId = new Map(entries.map((e) => [e.definition.id, e.definition]));
  }

  get(name: string): StateDefinition | undefined {
    return this.byName.get(name);
  }

  getById(id: string): StateDefinition | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.states.length;
  }

  /** Entries whose detection rule contains a method this engine does not know. */
  unsupportedEntries(): Array<{ name: string; methods: string[] }> {
    return this.states
      .map((entry) => ({ name: entry.name, methods: findUnsupportedMethods(entry.definition.detection) }))
      .filter((entry) => entry.methods.length > 0);
  }
}
