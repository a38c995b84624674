// Both ids become storage path segments, so neither may contain '/' or be '.' / '..'.
export const TENANT_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
export const LOG_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]{0,127}$/;

export const TENANT_ID_RULE = "letters, digits, '-' and '_' (1-64 characters)";
export const LOG_ID_RULE =
  "letters, digits, '.', ':', '-' and '_', starting with a letter or digit (1-128 characters)";

export function isValidTenantId(value: string): boolean {
  return TENANT_ID_PATTERN.test(value);
}

export function isValidLogId(value: string): boolean {
  return LOG_ID_PATTERN.test(value);
}
