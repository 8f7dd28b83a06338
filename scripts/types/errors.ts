/**
 * カスタムエラークラス集
 */

/**
 * アプリケーション基底エラー
 */
export class AppError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * 設定関連エラー
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/**
 * バージョンマニフェストの読み込み・検証エラー
 */
export class ManifestReadError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ManifestReadError";
  }
}

/**
 * プロセス起動エラー
 */
export class SpawnError extends AppError {
  constructor(
    message: string,
    public readonly executable: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SpawnError";
  }
}

export type SkipReason = "malformed-coordinate" | "missing-artifact";

/**
 * 依存ライブラリを解決できなかった（クラスパスから除外、致命的ではない）
 */
export class DependencyResolutionSkip extends AppError {
  constructor(
    public readonly coordinate: string,
    public readonly reason: SkipReason,
    public readonly candidates: readonly string[] = [],
  ) {
    super(
      reason === "malformed-coordinate"
        ? `Skipping library "${coordinate}": expected group:artifact:version`
        : `Skipping library "${coordinate}": no artifact found`,
    );
    this.name = "DependencyResolutionSkip";
  }
}

/**
 * バリデーションエラー
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ValidationError";
  }
}

/**
 * エラーをフォーマットして文字列として返す
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [error.message];
    if (error.cause) {
      parts.push(`Caused by: ${formatError(error.cause)}`);
    }
    return parts.join("\n");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * エラーを安全にログ出力
 */
export function logError(
  error: unknown,
  context?: string,
): void {
  const prefix = context ? `[${context}] ` : "";
  console.error(`${prefix}${formatError(error)}`);
}

/**
 * 警告をログ出力（処理は継続）
 */
export function logWarning(
  error: unknown,
  context?: string,
): void {
  const prefix = context ? `[${context}] ` : "";
  console.warn(`${prefix}${formatError(error)}`);
}
