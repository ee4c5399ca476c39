import type { CommandManagerSettings } from "../manager/types.js";

export interface CmdkitConfig {
  readonly logging: LoggingConfig;
  readonly settings: CommandManagerSettings;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}
