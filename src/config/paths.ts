import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "ADVISOR_STATE_DIR";

function expandHome(raw: string, homedir: () => string): string {
  if (raw === "~") {
    return homedir();
  }
  if (raw.startsWith("~/")) {
    return path.join(homedir(), raw.slice(2));
  }
  return raw;
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(homedir(), ".advisor");
}

export function resolveDefaultStorePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "advisor", "store.json");
}
