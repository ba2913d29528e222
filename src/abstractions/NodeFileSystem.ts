import * as fs from "node:fs/promises";
import { expandTilde } from "../paths";
import { IFileSystem } from "./IFileSystem";

// fs errors can come from another realm (Jest runs tests in a vm), where instanceof Error is false.
function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export class NodeFileSystem implements IFileSystem {
  async readFile(path: string): Promise<string> {
    return fs.readFile(expandTilde(path), "utf-8");
  }

  async writeFile(path: string, content: string): Promise<void> {
    await fs.writeFile(expandTilde(path), content, "utf-8");
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(expandTilde(path));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.stat(expandTilde(path))).isDirectory();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(expandTilde(path), options);
  }

  async unlink(path: string): Promise<void> {
    await fs.unlink(expandTilde(path));
  }
}
