// ─── Ports per service ─────────────────────────────
export const PORTS = {
  ORIGINATION: 3030,
  EXTRACTION: 3040,
  CUSTOMER_LOOKUP: 3041,
  DOCUMENTS: 3042,
} as const;

// ─── Internal URLs (defaults, overridable by env) ──
export const SERVICE_URLS = {
  EXTRACTION: `http://127.0.0.1:${PORTS.EXTRACTION}`,
  CUSTOMER_LOOKUP: `http://127.0.0.1:${PORTS.CUSTOMER_LOOKUP}`,
  DOCUMENTS: `http://127.0.0.1:${PORTS.DOCUMENTS}`,
} as const;
