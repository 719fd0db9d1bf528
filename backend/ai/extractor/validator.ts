import Ajv from "ajv";
import schema from "./parcel_payload.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });

export type ParcelPayload = {
  recipientName: string;
  roomNumber: string;
  shippingCompany: string;
  trackingNumber: string;
  [extra: string]: unknown;
};

const validate = ajv.compile<ParcelPayload>(schema);

/** Check a model payload against the parcel schema. Errors are advisory; the normalizer repairs them. */
export function validateParcelPayload(data: unknown): { ok: boolean; errors?: string[] } {
  const valid = validate(data);
  if (valid) return { ok: true };
  const errors = (validate.errors || []).map(e => `${e.instancePath || "/"} ${e.message}`);
  return { ok: false, errors };
}
