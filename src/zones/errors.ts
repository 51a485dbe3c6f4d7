/**
 * Zones Module - Error Types
 */

export type ZoneConfigError =
  | { readonly type: "FILE_UNREADABLE"; readonly message: string; readonly path: string }
  | { readonly type: "INVALID_JSON"; readonly message: string; readonly path: string }
  | { readonly type: "INVALID_SCHEMA"; readonly message: string; readonly issues: string[] }
  | { readonly type: "DUPLICATE_ZONE"; readonly message: string; readonly key: string }
  | { readonly type: "INVALID_HOT_WATER"; readonly message: string; readonly zoneId: number };

export function fileUnreadable(path: string, message: string): ZoneConfigError {
  return { type: "FILE_UNREADABLE", message, path };
}

export function invalidJson(path: string, message: string): ZoneConfigError {
  return { type: "INVALID_JSON", message, path };
}

export function invalidSchema(issues: string[]): ZoneConfigError {
  return { type: "INVALID_SCHEMA", message: "Zones file does not match schema", issues };
}

export function duplicateZone(key: string): ZoneConfigError {
  return { type: "DUPLICATE_ZONE", message: "Zone defined more than once", key };
}

export function invalidHotWater(zoneId: number, message: string): ZoneConfigError {
  return { type: "INVALID_HOT_WATER", message, zoneId };
}

/**
 * Format a ZoneConfigError for logging.
 */
export function formatZoneConfigError(error: ZoneConfigError): string {
  switch (error.type) {
    case "FILE_UNREADABLE":
      return `Cannot read zones file ${error.path}: ${error.message}`;
    case "INVALID_JSON":
      return `Zones file ${error.path} is not valid JSON: ${error.message}`;
    case "INVALID_SCHEMA":
      return `${error.message}: ${error.issues.join("; ")}`;
    case "DUPLICATE_ZONE":
      return `${error.message}: ${error.key}`;
    case "INVALID_HOT_WATER":
      return `Hot water zone ${error.zoneId}: ${error.message}`;
  }
}
