/**
 * 設定スキーマとデフォルト値
 */
import type { LaunchOptions, PlatformInfo } from "../launcher/types.ts";

/**
 * デフォルト値定義
 */
export const DEFAULTS = {
  CONFIG_PATH: "./wmml.config.yml",

  // パス
  MINECRAFT_ROOT: "./.minecraft",

  // プレイヤー
  PLAYER_NAME: "Player",

  // Java（メモリ指定なしはJVMの既定値）
  JAVA_PATH: "java",
  USE_SYSTEM_MEMORY: false,

  // プラットフォーム（アーキテクチャはホストから検出）
  PLATFORM_OS: "windows",
} as const;

/**
 * 環境変数名
 */
export const ENV = {
  MINECRAFT_ROOT: "WMML_MINECRAFT_ROOT",
  PLAYER_NAME: "WMML_PLAYER_NAME",
  JAVA_HOME: "JAVA_HOME",
} as const;

/**
 * Java設定型
 */
export type JavaConfig = {
  path?: string;
  memory?: number;
  use_system_memory?: boolean;
};

/**
 * プラットフォーム設定型
 */
export type PlatformConfig = {
  os?: string;
  arch?: string;
};

/**
 * 設定ファイルの完全な型
 */
export type WMMLConfigSchema = {
  minecraft_root?: string;
  player_name?: string;
  java?: JavaConfig;
  platform?: PlatformConfig;
};

/**
 * コマンドライン引数による上書き
 */
export type ConfigOverrides = {
  minecraftRoot?: string;
  playerName?: string;
  javaPath?: string;
  memory?: number;
  useSystemMemory?: boolean;
};

/**
 * 解決済み設定型（全てのデフォルト適用済み）
 */
export type ResolvedConfig = {
  minecraftRoot: string;
  playerName: string;
  launch: LaunchOptions;
  platform: PlatformInfo;
};
