import * as fs from "fs";
import * as path from "path";
import { invariant } from "./errors.js";
import type { RepoSpec } from "./model.js";

/**
 * A RepoSpec resolved against a concrete repos root
 */
export class RootedRepo {
  readonly spec: RepoSpec;
  /** Real path of `<base root>/<repo name>` */
  readonly root: string;
  readonly subDirectories: readonly string[];

  constructor(baseRoot: string, spec: RepoSpec) {
    const candidate = path.resolve(baseRoot, spec.name);
    invariant(fs.existsSync(candidate), `Repo root does not exist: ${candidate}`);

    this.spec = spec;
    this.root = fs.realpathSync(candidate);
    this.subDirectories = spec.subDirectories.map((subDirectory) =>
      path.join(this.root, subDirectory)
    );
  }

  toString(): string {
    const relative = this.subDirectories.map((dir) => path.relative(this.root, dir));
    return `${path.dirname(this.root)}, ${path.basename(this.root)}, [${relative.join(", ")}]`;
  }
}

export function repoSpec(name: string, ...subDirectories: string[]): RepoSpec {
  return { name, subDirectories };
}
