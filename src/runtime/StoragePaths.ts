import os from "node:os";
import path from "node:path";

export const getGlobalDocgapDir = (env: NodeJS.ProcessEnv = process.env): string => {
  const envHome = env.HOME ?? env.USERPROFILE;
  const homeDir = envHome && envHome.trim().length > 0 ? envHome : os.homedir();
  return path.join(homeDir, ".docgap");
};

export const getDefaultLogDir = (env: NodeJS.ProcessEnv = process.env): string =>
  path.join(getGlobalDocgapDir(env), "logs");

export const toDisplayPath = (filePath: string, cwd: string): string => {
  const resolved = path.resolve(cwd, filePath);
  const relative = path.relative(cwd, resolved);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    return resolved.split(path.sep).join("/");
  }
  return relative.split(path.sep).join("/");
};
