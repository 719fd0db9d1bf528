import {
  EXTRACTION_FAILED,
  NOT_FOUND,
  PARCEL_FIELDS,
  PARSE_FAILURE_MESSAGE,
  type ParcelField,
  type ParcelRecord,
} from "../../../shared/schema";
import { ResponseParseError, getErrorMessage } from "../../services/errors";
import { extractFenced } from "./fence";
import { validateParcelPayload } from "./validator";

// Key names an older prompt asked for; read only when the camelCase key is absent.
const SNAKE_CASE_ALIASES: Record<ParcelField, string> = {
  recipientName: "recipient_name",
  roomNumber: "room_number",
  shippingCompany: "shipping_company",
  trackingNumber: "tracking_number",
};

export type NormalizedReply =
  | { ok: true; record: ParcelRecord; warnings: string[] }
  | { ok: false; record: ParcelRecord; error: ResponseParseError };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fieldValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return NOT_FOUND;
}

export function fallbackRecord(): ParcelRecord {
  return Object.freeze({
    recipientName: EXTRACTION_FAILED,
    roomNumber: EXTRACTION_FAILED,
    shippingCompany: EXTRACTION_FAILED,
    trackingNumber: EXTRACTION_FAILED,
    error: PARSE_FAILURE_MESSAGE,
  });
}

/**
 * Fill the four required fields from a parsed payload. Missing or null keys
 * get the not-found sentinel. A model-sent `error` is kept as `modelError`,
 * since `error` marks the fallback record; every other key is carried over.
 */
export function backfillRecord(payload: Record<string, unknown>): ParcelRecord {
  const pick = (field: ParcelField) => {
    const value = payload[field] ?? (field in payload ? undefined : payload[SNAKE_CASE_ALIASES[field]]);
    return fieldValue(value);
  };
  const { error, ...rest } = payload;

  return Object.freeze({
    ...rest,
    recipientName: pick("recipientName"),
    roomNumber: pick("roomNumber"),
    shippingCompany: pick("shippingCompany"),
    trackingNumber: pick("trackingNumber"),
    ...(error === undefined ? {} : { modelError: error }),
  });
}

/**
 * Turn a raw model reply into a ParcelRecord. Never throws: anything that is
 * not a JSON object yields the fallback record plus the parse error, which the
 * caller logs.
 */
export function normalizeReply(rawReply: string): NormalizedReply {
  const { content } = extractFenced(rawReply);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    return {
      ok: false,
      record: fallbackRecord(),
      error: new ResponseParseError(`Model reply is not valid JSON: ${getErrorMessage(e)}`, rawReply, { cause: e }),
    };
  }

  if (!isPlainObject(parsed)) {
    const got = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed;
    return {
      ok: false,
      record: fallbackRecord(),
      error: new ResponseParseError(`Model reply is JSON but not an object (got ${got})`, rawReply),
    };
  }

  const check = validateParcelPayload(parsed);
  return { ok: true, record: backfillRecord(parsed), warnings: check.errors ?? [] };
}

export function serializeRecord(record: ParcelRecord): string {
  return JSON.stringify(record);
}
