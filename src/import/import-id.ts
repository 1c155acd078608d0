import { MalformedImportIdError } from "../errors/errors.js";

export interface ZoneImportId {
  id: string;
  /** Set when importing a zone owned by another project */
  projectId?: string;
}

/**
 * Parse `<id>` or `<id>:<projectId>`.
 * @throws MalformedImportIdError
 */
export function parseImportId(importId: string): ZoneImportId {
  const parts = importId.split(":");
  const [id, projectId] = parts;

  if (!id || parts.length > 2) {
    throw new MalformedImportIdError(importId);
  }
  return projectId === undefined ? { id } : { id, projectId };
}
