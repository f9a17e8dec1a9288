import { loadCatalog } from "./catalog/loader.js";
import type { StateCatalog } from "./catalog/state-catalog.js";
import { loadEngineConfig, type EngineConfig } from "./config.js";
import { CrmUpdater } from "./crm/crm-updater.js";
import { StateDetector } from "./engine/state-detector.js";
import { createLogger, type Logger } from "./logger.js";
import { ResponseValidator } from "./validation/response-validator.js";

export interface StateEngine {
  config: EngineConfig;
  catalog: StateCatalog;
  detector: StateDetector;
  updater: CrmUpdater;
  validator: ResponseValidator;
  logger: Logger;
}

export interface CreateStateEngineOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Loads the catalog once and wires every component around that single
 * instance. A catalog that cannot be loaded aborts startup.
 */
export async function createStateEngine(
  config: EngineConfig = loadEngineConfig(),
  options: CreateStateEngineOptions = {},
): Promise<StateEngine> {
  const logger = options.logger ?? createLogger({ name: "state-engine", level: config.logLevel });

  const catalog = await loadCatalog(config.catalogPath);
  logger.info(
    { path: config.catalogPath, version: catalog.version, states: catalog.size },
    "State catalog loaded",
  );

  return {
    config,
    catalog,
    detector: new StateDetector(catalog, { logger, clock: options.clock }),
    updater: new CrmUpdater({ logger, autoExtract: config.crm.autoExtract }),
    validator: new ResponseValidator({
      catalog,
      logger,
      minLength: config.validator.minLength,
      maxLength: config.validator.maxLength,
      extraForbiddenTerms: config.validator.extraForbiddenTerms,
    }),
    logger,
  };
}
