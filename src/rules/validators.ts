import type { MatchValidator } from "./types.js";

/**
 * Payment card checksum. Separators (spaces, dashes) are ignored; anything
 * shorter than 12 digits fails.
 */
export function luhnCheck(value: string): boolean {
  const digits = value.replace(/[\s-]/g, "");
  if (!/^\d{12,19}$/.test(digits)) {
    return false;
  }

  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i -= 1) {
    let digit = Number(digits.charAt(i));
    if (double) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }
    sum += digit;
    double = !double;
  }
  return sum % 10 === 0;
}

export const MATCH_VALIDATORS: Readonly<Record<string, MatchValidator>> = {
  luhn: luhnCheck,
};

export function getValidator(name: string): MatchValidator | undefined {
  return Object.hasOwn(MATCH_VALIDATORS, name)
    ? MATCH_VALIDATORS[name]
    : undefined;
}
