import fs from "node:fs";
import path from "node:path";

function isExecutable(p: string): boolean {
  try {
    fs.accessSync(p, fs.constants.X_OK);
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Resolve `cmd` on PATH the way execFile would; null when it is not there. */
export function which(cmd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (cmd.includes("/") || cmd.includes(path.sep)) {
    return isExecutable(cmd) ? path.resolve(cmd) : null;
  }
  const dirs = env.PATH?.split(path.delimiter).filter(Boolean) ?? [];
  for (const dir of dirs) {
    const full = path.join(dir, cmd);
    if (isExecutable(full)) return full;
  }
  return null;
}
