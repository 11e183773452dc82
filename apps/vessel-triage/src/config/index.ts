/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    CatalogError,
    DEFAULT_CATALOG_PATH,
    deepFreeze,
    loadCatalog,
    parseCatalog,
    parseCatalogYaml,
} from "./loadCatalog.js";
export { loadSettings, SettingsError, type Settings } from "./settings.js";
