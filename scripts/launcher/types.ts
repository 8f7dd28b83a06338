export type RuleAction = "allow" | "disallow";

export type Rule = {
  action: RuleAction;
  os?: {
    name: string;
    arch?: string;
  };
};

export type Library = {
  name: string; // group:artifact:version
  natives?: Record<string, string>;
  rules?: Rule[];
};

export type Argument = string | {
  rules?: unknown[];
  value?: unknown;
};

export type VersionJson = {
  id: string;
  mainClass: string;
  assets: string;
  libraries: Library[];
  minecraftArguments?: string; // Legacy
  arguments?: {
    game?: Argument[];
  };
};

export type PlatformInfo = {
  osName: string;
  osArch: string;
  archBits: "64" | "32";
};

export type LaunchOptions = {
  javaPath?: string;
  memory?: number; // MB
  useSystemMemory?: boolean;
};

export type RuntimeContext = {
  playerName: string;
  versionName: string;
  gameDirectory: string;
  assetsRoot: string;
  assetsIndexName: string;
  authUuid: string;
  authAccessToken: string;
  userType: string;
  versionType: string;
};

export type LaunchPlan = Readonly<{
  executable: string;
  flags: readonly string[];
  classpath: string;
  mainClass: string;
  gameArguments: string;
  /** `gameArguments` as separate argv entries */
  gameArgv: readonly string[];
}>;

export type CommandLine = {
  executable: string;
  args: string[];
  cwd?: string;
};

export type ProcessHandle = {
  pid: number;
};

export type LaunchResult = ProcessHandle & {
  plan: LaunchPlan;
  commandLine: string;
};

export type Logger = Pick<Console, "info" | "warn" | "error">;
