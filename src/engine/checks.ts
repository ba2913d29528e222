import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import { graphDir } from "./commands";
import { checkJava } from "./java";

export interface CheckDeps {
  fs: IFileSystem;
  runner: IProcessRunner;
}

export interface SetupCheckOptions {
  otp: string;
  dir: string;
  router: string;
  /** Also require a built Graph.obj. */
  graph: boolean;
}

export interface SetupCheckResult {
  javaVersion: number;
  graphDir: string;
}

/**
 * Pre-flight checks shared by graph building and engine start-up. Throws on
 * the first failure, naming the missing path.
 */
export async function runSetupChecks(
  deps: CheckDeps,
  options: SetupCheckOptions
): Promise<SetupCheckResult> {
  const { fs, runner } = deps;
  const { otp, dir, router } = options;

  if (!(await fs.exists(otp))) {
    throw new Error(`OTP jar not found: ${otp}`);
  }
  if (!otp.toLowerCase().endsWith(".jar")) {
    throw new Error(`OTP jar must be a .jar file: ${otp}`);
  }
  if (!(await fs.isDirectory(dir))) {
    throw new Error(`Directory not found: ${dir}`);
  }

  const routerDir = graphDir(dir, router);
  if (!(await fs.isDirectory(routerDir))) {
    throw new Error(`Router directory not found: ${routerDir}`);
  }

  const javaVersion = await checkJava(runner);

  if (options.graph && !(await fs.exists(`${routerDir}/Graph.obj`))) {
    throw new Error(`Graph not found: ${routerDir}/Graph.obj`);
  }

  return { javaVersion, graphDir: routerDir };
}
