import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { CatalogDocumentSchema } from "@exam-desk/schemas";
import { CatalogError } from "../errors.js";
import { StateCatalog } from "./state-catalog.js";

/** Catalog bundled with the package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("../../catalog/candidate-states.json", import.meta.url),
);

export function parseCatalog(raw: unknown, source?: string): StateCatalog {
  const result = CatalogDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new CatalogError(
      `Invalid state catalog${source ? ` (${source})` : ""}`,
      issues,
      source,
    );
  }
  return new StateCatalog(result.data);
}

export async function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<StateCatalog> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Cannot read state catalog: ${message}`, [], path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`State catalog is not valid JSON: ${message}`, [], path);
  }

  return parseCatalog(raw, path);
}
