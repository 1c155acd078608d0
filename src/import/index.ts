export { parseImportId, type ZoneImportId } from "./import-id.js";
