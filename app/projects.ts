import { existsSync, readdirSync } from "fs";
import { join } from "path";
import type { Tenant } from "@labframe/notify-core";
import { SqliteChangeSource } from "../adapters/sqlite";
import { PROJECT_NAME } from "./config";
import { InvalidProjectNameError, ProjectNotFoundError } from "./errors";

const EXT = ".sqlite";

export type ProjectDirectoryOptions = {
  dataDir: string;
  defaultDbPath: string;
  activeProject?: string | null;
};

/**
 * Maps project names to their databases: the default project lives at
 * `defaultDbPath`, named ones under `<dataDir>/projects/<name>.sqlite`.
 */
export class ProjectDirectory {
  constructor(private readonly opts: ProjectDirectoryOptions) {}

  get projectsDir(): string {
    return join(this.opts.dataDir, "projects");
  }

  /** First non-empty of query, header, configured active project; else the default project. */
  resolveTenant(query?: string | null, header?: string | null): Tenant {
    const name = [query, header].find(v => v != null && v.trim() !== "")?.trim() ?? this.opts.activeProject ?? null;
    if (name === null) return null;
    if (!PROJECT_NAME.test(name)) throw new InvalidProjectNameError(name);
    return name;
  }

  dbPath(tenant: Tenant): string {
    return tenant === null ? this.opts.defaultDbPath : join(this.projectsDir, `${tenant}${EXT}`);
  }

  /** Change source for an existing project database. */
  source(tenant: Tenant): SqliteChangeSource {
    const path = this.dbPath(tenant);
    if (tenant !== null && !existsSync(path)) throw new ProjectNotFoundError(tenant);
    return new SqliteChangeSource(tenant, path);
  }

  list(): string[] {
    if (!existsSync(this.projectsDir)) return [];
    return readdirSync(this.projectsDir)
      .filter(f => f.endsWith(EXT))
      .map(f => f.slice(0, -EXT.length))
      .filter(name => PROJECT_NAME.test(name))
      .sort();
  }
}
