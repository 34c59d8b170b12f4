import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "PROBTRADE_STATE_DIR";
export const CONFIG_PATH_ENV = "PROBTRADE_CONFIG_PATH";

function expandHome(value: string, homedir: () => string): string {
  if (value === "~") {
    return homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(homedir(), value.slice(2));
  }
  return value;
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(homedir(), ".probtrade");
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(resolveStateDir(env, homedir), "config.json");
}
