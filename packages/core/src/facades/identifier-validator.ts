import type { FacadeResult, IdentifierValidator, ValidatedGstin } from "./types.ts";

const PAN_PATTERN = /^[A-Z]{5}[0-9]{4}[A-Z]$/;
const GSTIN_PATTERN = /^[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z][1-9A-Z]Z[0-9A-Z]$/;

// State codes 01-38 plus 97 (other territory) and 99 (centre jurisdiction).
const MAX_STATE_CODE = 38;
const SPECIAL_STATE_CODES: ReadonlySet<string> = new Set(["97", "99"]);

export function normalizeIdentifier(raw: string): string {
  return raw.replace(/\s+/g, "").toUpperCase();
}

export function isValidPan(value: string): boolean {
  return PAN_PATTERN.test(value);
}

export function isValidGstin(value: string): boolean {
  if (!GSTIN_PATTERN.test(value)) {
    return false;
  }
  const stateCode = value.slice(0, 2);
  const stateNumber = Number.parseInt(stateCode, 10);
  const knownState = SPECIAL_STATE_CODES.has(stateCode) || (stateNumber >= 1 && stateNumber <= MAX_STATE_CODE);
  return knownState && isValidPan(value.slice(2, 12));
}

/** Format-only validation used when no registry lookup is configured. */
export function createFormatIdentifierValidator(): IdentifierValidator {
  return {
    validateGstin: async (raw) => validateGstinFormat(raw),
    validatePan: async (raw) => {
      const pan = normalizeIdentifier(raw);
      if (!isValidPan(pan)) {
        return { ok: false, error: { kind: "invalid_input", message: "PAN format is invalid." } };
      }
      return { ok: true, value: { pan } };
    },
  };
}

function validateGstinFormat(raw: string): FacadeResult<ValidatedGstin> {
  const gstin = normalizeIdentifier(raw);
  if (!isValidGstin(gstin)) {
    return { ok: false, error: { kind: "invalid_input", message: "GSTIN format is invalid." } };
  }
  return {
    ok: true,
    value: {
      gstin,
      state_code: gstin.slice(0, 2),
      pan: gstin.slice(2, 12),
    },
  };
}
