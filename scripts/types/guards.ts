/**
 * 型ガード関数集
 */

/**
 * 値が非null/undefinedかどうかをチェック
 */
export function isDefined<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

/**
 * 値が文字列かどうかをチェック
 */
export function isString(value: unknown): value is string {
  return typeof value === "string";
}

/**
 * 値が空でない文字列かどうかをチェック
 */
export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

/**
 * 値がオブジェクトかどうかをチェック
 */
export function isObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 値がすべて文字列のオブジェクトかどうかをチェック
 */
export function isStringRecord(
  value: unknown,
): value is Record<string, string> {
  return isObject(value) && Object.values(value).every(isString);
}
