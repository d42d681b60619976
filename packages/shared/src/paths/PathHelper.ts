import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Resolves agentline paths for the global scope (`~/.agentline`) and for a
 * workspace (`<cwd>/.agentline`).
 */
export class PathHelper {
  static getGlobalDir(): string {
    return path.join(os.homedir(), ".agentline");
  }

  static getGlobalDbPath(): string {
    return path.join(this.getGlobalDir(), "agentline.db");
  }

  static getWorkspaceDir(cwd: string = process.cwd()): string {
    return path.join(cwd, ".agentline");
  }

  static getWorkspaceLogDir(cwd: string = process.cwd()): string {
    return path.join(this.getWorkspaceDir(cwd), "logs");
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
