// Catalog
export * from "./catalog.js";

// Detection inputs
export * from "./inputs.js";

// Engine outputs
export * from "./alerts.js";
export * from "./crm-update.js";
export * from "./validation.js";
