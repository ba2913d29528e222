import { IFileSystem } from "./IFileSystem";

function parentOf(path: string): string {
  return path.substring(0, path.lastIndexOf("/")) || "/";
}

/**
 * Flat map of absolute posix paths. Writing a file does not require its
 * directory to exist, so tests can drop a config file anywhere.
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>(["/"]);

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    if (this.dirs.has(path)) {
      throw new Error(`EISDIR: '${path}' is a directory`);
    }
    this.files.set(path, content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.dirs.has(path);
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    if (!options?.recursive) {
      if (!this.dirs.has(parentOf(path))) {
        throw new Error(`ENOENT: no such directory '${parentOf(path)}'`);
      }
      this.dirs.add(path);
      return;
    }
    let current = "";
    for (const part of path.split("/").filter(Boolean)) {
      current += `/${part}`;
      this.dirs.add(current);
    }
  }

  async unlink(path: string): Promise<void> {
    if (!this.files.delete(path)) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
  }
}
