/**
 * Stable codes attached to {@link RoutingConfigurationError}. They are the only
 * failures the routing engine raises: every other "no match" outcome is a
 * regular return value.
 */
export const ROUTER_ERROR_CODES = {
  SYNONYM_CONFLICT: "E-ROUTER-SYNONYM-CONFLICT",
  PATTERN_CONFLICT: "E-ROUTER-PATTERN-CONFLICT",
  PATTERN_INVALID: "E-ROUTER-PATTERN-INVALID",
  UNKNOWN_TOOL: "E-ROUTER-UNKNOWN-TOOL",
  CATALOG_DUPLICATE: "E-ROUTER-CATALOG-DUPLICATE",
  DATA_INVALID: "E-ROUTER-DATA-INVALID",
} as const;

export type RouterErrorCode = (typeof ROUTER_ERROR_CODES)[keyof typeof ROUTER_ERROR_CODES];

/**
 * Raised while the synonym table, pattern library or tool catalog is being
 * assembled. A router is never constructed from data that triggered this
 * error, so query-time code does not have to guard against it.
 */
export class RoutingConfigurationError extends Error {
  public readonly code: RouterErrorCode;
  public readonly details?: unknown;

  constructor(code: RouterErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "RoutingConfigurationError";
    this.code = code;
    this.details = details;
  }
}
