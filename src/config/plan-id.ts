/**
 * Plan ID helpers
 */

export const DEFAULT_PLAN_ID = "myosevka";

export const PLAN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isValidPlanId(value: string): boolean {
  return PLAN_ID_PATTERN.test(value);
}

/**
 * 英字の連続ごとに先頭を大文字、残りを小文字にする
 * 例: "myosevka" → "Myosevka", "my-term" → "My-Term"
 */
export function titleCase(value: string): string {
  return value.replace(
    /[A-Za-z]+/g,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}
