export {
  CommandCatalog,
  decodeTelemetryValue,
  encodeCommandValue,
  type CommandCatalogOptions,
} from "./catalog.ts";
export {
  catalogSchema,
  loadCatalog,
  parseCatalog,
  type Catalog,
  type CatalogFile,
  type RegisterCommand,
  type TelemetryPoint,
} from "./schema.ts";
