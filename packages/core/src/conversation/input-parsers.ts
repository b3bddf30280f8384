import { ValidationError } from "../errors.ts";
import type { TransportDetails, TransportMode } from "../facades/types.ts";

const PERIOD_PATTERNS: ReadonlyArray<{ pattern: RegExp; year: number; month: number }> = [
  { pattern: /^(\d{4})[-/](\d{1,2})$/, year: 1, month: 2 },
  { pattern: /^(\d{1,2})[-/](\d{4})$/, year: 2, month: 1 },
];
const NONE_WORDS: ReadonlySet<string> = new Set(["none", "no", "zero"]);
const MAX_LABEL_LENGTH = 40;
const IRN_PATTERN = /^[0-9a-f]{64}$/;
const EWB_NUMBER_PATTERN = /^\d{12}$/;
const VEHICLE_NUMBER_PATTERN = /^[A-Z]{2}\d{1,2}[A-Z]{0,3}\d{4}$/;
const TRANSPORT_MODES: Readonly<Partial<Record<string, TransportMode>>> = {
  road: "road",
  rail: "rail",
  air: "air",
  ship: "ship",
};
export const DEFAULT_VEHICLE_CHANGE_REASON = "Vehicle breakdown";

/** GST returns are filed for the month that just ended. */
export function currentFilingPeriod(now: Date): string {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  return month === 0 ? `${year - 1}-12` : `${year}-${String(month).padStart(2, "0")}`;
}

/** Accepts YYYY-MM, YYYY/MM, MM-YYYY and MM/YYYY. Periods after the current month are rejected. */
export function parsePeriod(raw: string, now: Date): string {
  const trimmed = raw.trim();
  for (const entry of PERIOD_PATTERNS) {
    const match = entry.pattern.exec(trimmed);
    if (!match) {
      continue;
    }
    const year = Number.parseInt(match[entry.year] ?? "", 10);
    const month = Number.parseInt(match[entry.month] ?? "", 10);
    if (month < 1 || month > 12 || year < 2017) {
      break;
    }
    const isFuture = year > now.getUTCFullYear() ||
      (year === now.getUTCFullYear() && month > now.getUTCMonth() + 1);
    if (isFuture) {
      break;
    }
    return `${year}-${String(month).padStart(2, "0")}`;
  }
  throw new ValidationError("Period must be YYYY-MM and not in the future.", { field: "period" });
}

/** Rupee amounts: digits with optional commas, a leading ₹ or "rs", and "none" for zero. */
export function parseAmount(raw: string, field = "amount"): number {
  const normalized = raw.trim().toLowerCase();
  if (NONE_WORDS.has(normalized)) {
    return 0;
  }
  const digits = normalized.replace(/^(₹|rs\.?|inr)\s*/, "").replace(/,/g, "");
  if (!/^\d+(\.\d{1,2})?$/.test(digits)) {
    throw new ValidationError("Amount must be a number.", { field });
  }
  const amount = Number.parseFloat(digits);
  if (!Number.isFinite(amount)) {
    throw new ValidationError("Amount must be a number.", { field });
  }
  return amount;
}

export function parsePaymentEntry(raw: string): { challan_number: string; amount: number } {
  const parts = raw.trim().split(/\s+/);
  const [challan, amountText] = parts;
  if (parts.length !== 2 || !challan || !amountText || !/^[A-Za-z0-9]{4,20}$/.test(challan)) {
    throw new ValidationError("Payment must be '<challan> <amount>'.", { field: "payment" });
  }
  const amount = parseAmount(amountText, "payment");
  if (amount <= 0) {
    throw new ValidationError("Payment amount must be positive.", { field: "payment" });
  }
  return { challan_number: challan.toUpperCase(), amount };
}

export function parseLabel(raw: string): string {
  const label = raw.trim().replace(/\s+/g, " ");
  if (!label || label.length > MAX_LABEL_LENGTH) {
    throw new ValidationError(`Label must be 1-${MAX_LABEL_LENGTH} characters.`, { field: "label" });
  }
  return label;
}

/** Invoice reference numbers are 64 hex characters; case is not significant. */
export function parseIrn(raw: string): string {
  const irn = raw.trim().toLowerCase();
  if (!IRN_PATTERN.test(irn)) {
    throw new ValidationError("IRN must be 64 hexadecimal characters.", { field: "irn" });
  }
  return irn;
}

export function parseEwayBillNumber(raw: string, field = "ewb_number"): string {
  const digits = raw.replace(/\s+/g, "");
  if (!EWB_NUMBER_PATTERN.test(digits)) {
    throw new ValidationError("E-way bill number must be 12 digits.", { field });
  }
  return digits;
}

export function parseVehicleNumber(raw: string, field = "transport"): string {
  const vehicle = raw.replace(/[\s-]+/g, "").toUpperCase();
  if (!VEHICLE_NUMBER_PATTERN.test(vehicle)) {
    throw new ValidationError("Vehicle number must look like MH12AB1234.", { field });
  }
  return vehicle;
}

/** "vehicle, mode, distance"; mode defaults to road and distance to 0 km. */
export function parseTransportDetails(raw: string): TransportDetails {
  const [vehicle = "", modeText = "", distanceText = ""] = raw.split(",").map((part) => part.trim());
  const mode = modeText ? TRANSPORT_MODES[modeText.toLowerCase()] : "road";
  if (mode === undefined) {
    throw new ValidationError("Mode must be road, rail, air or ship.", { field: "transport" });
  }
  let distance = 0;
  if (distanceText) {
    if (!/^\d{1,4}$/.test(distanceText)) {
      throw new ValidationError("Distance must be whole kilometres.", { field: "transport" });
    }
    distance = Number.parseInt(distanceText, 10);
  }
  return { vehicle_number: parseVehicleNumber(vehicle), mode, distance_km: distance };
}

/** "e-way bill number, new vehicle, reason"; the reason is optional. */
export function parseVehicleUpdate(raw: string): { ewb_number: string; vehicle_number: string; reason: string } {
  const [ewbText = "", vehicle = "", ...reasonParts] = raw.split(",").map((part) => part.trim());
  const reason = reasonParts.join(", ").trim();
  return {
    ewb_number: parseEwayBillNumber(ewbText, "vehicle_update"),
    vehicle_number: parseVehicleNumber(vehicle, "vehicle_update"),
    reason: reason || DEFAULT_VEHICLE_CHANGE_REASON,
  };
}

const RUPEE_FORMAT = new Intl.NumberFormat("en-IN", {
  style: "currency",
  currency: "INR",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatRupees(amount: number): string {
  return RUPEE_FORMAT.format(amount);
}
