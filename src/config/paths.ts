export function getConfigPath(): string {
  return process.env["CMDKIT_CONFIG_PATH"] ?? "cmdkit.config.json";
}
