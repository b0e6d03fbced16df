const EMAIL = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const CARD_NUMBER =
  /\b(?:\d{12,19}|\d{4}(?:[ -]\d{4}){2,3}|\d{4}[ -]\d{6}[ -]\d{4,5})\b/g;
const SSN = /\b\d{3}-\d{2}-\d{4}\b/g;
const PHONE_NUMBER = /\b\d{3}[- ]?\d{3}[- ]?\d{4}\b/g;
const TOKEN = /[A-Za-z0-9+/_-]{20,}/g;

/**
 * Mask a secret, keeping only its first characters.
 */
export function maskSecret(value: string, prefixLength = 4): string {
  if (value.length <= prefixLength * 2) {
    return "*".repeat(value.length);
  }
  const maskLength = Math.min(value.length - prefixLength, 8);
  return `${value.slice(0, prefixLength)}${"*".repeat(maskLength)}[MASKED]`;
}

/**
 * Redact e-mail addresses, card numbers (12 to 19 digits), social security
 * and phone numbers, and secret-looking tokens (20+ characters mixing
 * letters and digits) from evidence text.
 */
export function redactSensitive(text: string): string {
  return text
    .replace(EMAIL, "****@****.***")
    .replace(CARD_NUMBER, "****-****-****-****")
    .replace(SSN, "***-**-****")
    .replace(PHONE_NUMBER, "***-***-****")
    .replace(TOKEN, (token) =>
      /\d/.test(token) && /[A-Za-z]/.test(token) ? maskSecret(token) : token,
    );
}
