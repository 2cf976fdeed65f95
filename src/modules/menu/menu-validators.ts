import { ValidatorSpec } from "./types/menu.types";

export type ValidationOutcome =
  | { valid: true; value: string }
  | { valid: false; message: string };

const PHONE_PATTERN = /^\+?\d{9,15}$/;
const DEFAULT_MAX_TEXT = 100;

/** Collapses runs of whitespace; USSD handsets pad free text inconsistently */
export const normalizeText = (raw: string): string => raw.trim().replace(/\s+/g, " ");

/** Strips separators and the leading plus sign from a phone number */
export const normalizePhone = (raw: string): string => raw.replace(/[\s-]/g, "").replace(/^\+/, "");

export function validateInput(spec: ValidatorSpec, raw: string): ValidationOutcome {
  const value = normalizeText(raw);

  switch (spec.type) {
    case "text": {
      const min = spec.minLength ?? 1;
      const max = spec.maxLength ?? DEFAULT_MAX_TEXT;
      if (value.length === 0) {
        return { valid: false, message: "Entry cannot be empty." };
      }
      if (value.length < min) {
        return { valid: false, message: `Enter at least ${min} characters.` };
      }
      if (value.length > max) {
        return { valid: false, message: `Enter at most ${max} characters.` };
      }
      return { valid: true, value };
    }

    case "phone": {
      const compact = value.replace(/[\s-]/g, "");
      if (!PHONE_PATTERN.test(compact)) {
        return { valid: false, message: "Enter a valid phone number." };
      }
      return { valid: true, value: normalizePhone(compact) };
    }

    case "number": {
      const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;
      const min = spec.min ?? 0;
      const max = spec.max ?? Number.MAX_SAFE_INTEGER;
      if (Number.isNaN(parsed) || parsed < min || parsed > max) {
        return {
          valid: false,
          message: spec.max === undefined ? "Enter a number." : `Enter a number from ${min} to ${max}.`,
        };
      }
      return { valid: true, value: String(parsed) };
    }

    case "pattern":
      if (!new RegExp(spec.pattern).test(value)) {
        return { valid: false, message: spec.message ?? "Invalid entry." };
      }
      return { valid: true, value };
  }
}

/** Replaces `{field}` placeholders; unknown fields render empty */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{([a-zA-Z][a-zA-Z0-9_]*)\}/g, (_, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : "",
  );
}
