export interface CatalogIssue {
  path: string;
  message: string;
}

/** The state catalog could not be read or is structurally invalid. */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly issues: CatalogIssue[] = [],
    public readonly source?: string,
  ) {
    const detail = issues.map((i) => `  ${i.path || "(root)"}: ${i.message}`).join("\n");
    super(detail ? `${message}\n${detail}` : message);
    this.name = "CatalogError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
