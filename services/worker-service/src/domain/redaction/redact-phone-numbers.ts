export const REDACTION_MARKER = '[REDACTED]';

interface PhoneNumberRule {
  name: string;
  pattern: string;
}

/**
 * Ordered most specific first. At any position the first rule that matches wins, so a
 * parenthesised or ten-digit number is never partially consumed by the seven-digit rule.
 * Digits are any Unicode decimal digit, not only ASCII.
 */
export const PHONE_NUMBER_RULES: readonly PhoneNumberRule[] = [
  { name: 'parenthesised-area-code', pattern: String.raw`\(\p{Nd}{3}\)\s*\p{Nd}{3}-\p{Nd}{4}` },
  { name: 'ten-digit', pattern: String.raw`\p{Nd}{3}-\p{Nd}{3}-\p{Nd}{4}` },
  { name: 'seven-digit', pattern: String.raw`\p{Nd}{3}-\p{Nd}{4}` },
];

const PHONE_NUMBER_PATTERN = new RegExp(PHONE_NUMBER_RULES.map((rule) => rule.pattern).join('|'), 'gu');

/** Replaces every phone-number-shaped substring with {@link REDACTION_MARKER}. */
export function redactPhoneNumbers(text: string): string {
  return text.replace(PHONE_NUMBER_PATTERN, REDACTION_MARKER);
}
