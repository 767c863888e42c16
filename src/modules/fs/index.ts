// src/modules/fs/index.ts
// Local file-system module. Every path is resolved under a fixed root.
import { readdir, readFile, rm, stat, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { ModuleError } from "../../errors.js";
import type { CapabilityDescriptor, ExecutionResult, Parameters } from "../../types/intent.js";
import type { CapabilityModule, ExecutionContext } from "../../types/modules.js";

export interface FsModuleOptions {
  root: string;
  maxMatches?: number;
  maxReadBytes?: number;
}

const SKIP_DIRS = new Set(["node_modules", ".git", "dist"]);

export const fsDescriptor: CapabilityDescriptor = {
  name: "fs",
  description: "Local files under the workspace root",
  actions: {
    list_dir: {
      description: "List the entries of a directory",
      parameters: { path: { type: "string", description: "directory, default the root" } },
    },
    find_pattern: {
      description: "Find lines containing a text pattern",
      parameters: {
        pattern: { type: "string", required: true },
        path: { type: "string", description: "directory or file to search, default the root" },
      },
    },
    read_file: {
      description: "Read a text file",
      parameters: { path: { type: "string", required: true } },
    },
    write_file: {
      description: "Create or overwrite a text file",
      parameters: { path: { type: "string", required: true }, content: { type: "string", required: true } },
    },
    delete_file: {
      description: "Delete a file",
      parameters: { path: { type: "string", required: true } },
    },
  },
  destructiveActions: ["write_file", "delete_file"],
  idempotentActions: ["list_dir", "find_pattern", "read_file"],
};

export class FsModule implements CapabilityModule {
  readonly descriptor = fsDescriptor;
  private readonly root: string;
  private readonly maxMatches: number;
  private readonly maxReadBytes: number;

  constructor(opts: FsModuleOptions) {
    this.root = path.resolve(opts.root);
    this.maxMatches = opts.maxMatches ?? 200;
    this.maxReadBytes = opts.maxReadBytes ?? 1024 * 1024;
  }

  async execute(action: string, params: Parameters, ctx: ExecutionContext): Promise<ExecutionResult> {
    switch (action) {
      case "list_dir": return this.listDir(str(params.path) ?? ".");
      case "find_pattern": return this.findPattern(required(params, "pattern"), str(params.path) ?? ".", ctx.signal);
      case "read_file": return this.readFile(required(params, "path"));
      case "write_file": return this.writeFile(required(params, "path"), required(params, "content"));
      case "delete_file": return this.deleteFile(required(params, "path"));
      default: throw new ModuleError(`unsupported fs action: ${action}`);
    }
  }

  /** Resolves a user path under the root; anything that escapes it is refused. */
  resolvePath(p: string): string {
    const abs = path.resolve(this.root, p);
    const rel = path.relative(this.root, abs);
    if (rel === ".." || rel.startsWith(".." + path.sep) || path.isAbsolute(rel)) {
      throw new ModuleError(`path '${p}' is outside the workspace root`);
    }
    return abs;
  }

  private display(abs: string): string {
    return path.relative(this.root, abs) || ".";
  }

  private async listDir(p: string): Promise<ExecutionResult> {
    const abs = this.resolvePath(p);
    const entries = await readdir(abs, { withFileTypes: true }).catch(err => { throw fsFailure(err, p); });
    const names = entries
      .map(e => (e.isDirectory() ? `${e.name}/` : e.name))
      .sort((a, b) => a.localeCompare(b));
    const rel = this.display(abs);
    return {
      summary: `${names.length} entr${names.length === 1 ? "y" : "ies"} in ${rel}`,
      output: { path: rel, entries: names },
      facts: { "fs.last_path": rel },
    };
  }

  private async findPattern(pattern: string, p: string, signal: AbortSignal): Promise<ExecutionResult> {
    const abs = this.resolvePath(p);
    const matches: string[] = [];
    const visit = async (file: string): Promise<void> => {
      if (signal.aborted || matches.length >= this.maxMatches) return;
      const info = await stat(file);
      if (info.isDirectory()) {
        const entries = await readdir(file, { withFileTypes: true });
        for (const e of entries.sort((a, b) => a.name.localeCompare(b.name))) {
          if (e.isDirectory() && SKIP_DIRS.has(e.name)) continue;
          await visit(path.join(file, e.name));
        }
        return;
      }
      if (!info.isFile() || info.size > this.maxReadBytes) return;
      const lines = (await readFile(file, "utf8")).split(/\r?\n/);
      lines.forEach((line, i) => {
        if (matches.length < this.maxMatches && line.includes(pattern)) {
          matches.push(`${this.display(file)}:${i + 1}: ${line.trim()}`);
        }
      });
    };
    await visit(abs).catch(err => { throw fsFailure(err, p); });
    return {
      summary: `${matches.length} match${matches.length === 1 ? "" : "es"} for '${pattern}' in ${this.display(abs)}`,
      output: { pattern, matches, truncated: matches.length >= this.maxMatches },
    };
  }

  private async readFile(p: string): Promise<ExecutionResult> {
    const abs = this.resolvePath(p);
    const info = await stat(abs).catch(err => { throw fsFailure(err, p); });
    if (!info.isFile()) throw new ModuleError(`'${p}' is not a file`);
    if (info.size > this.maxReadBytes) throw new ModuleError(`'${p}' is larger than ${this.maxReadBytes} bytes`);
    const content = await readFile(abs, "utf8");
    const rel = this.display(abs);
    return {
      summary: `read ${info.size} bytes from ${rel}`,
      output: { path: rel, content },
      facts: { "fs.last_path": rel },
    };
  }

  private async writeFile(p: string, content: string): Promise<ExecutionResult> {
    const abs = this.resolvePath(p);
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, content, "utf8").catch(err => { throw fsFailure(err, p); });
    const rel = this.display(abs);
    return {
      summary: `wrote ${Buffer.byteLength(content)} bytes to ${rel}`,
      output: { path: rel },
      facts: { "fs.last_path": rel },
    };
  }

  private async deleteFile(p: string): Promise<ExecutionResult> {
    const abs = this.resolvePath(p);
    if (abs === this.root) throw new ModuleError("refusing to delete the workspace root");
    const info = await stat(abs).catch(err => { throw fsFailure(err, p); });
    if (!info.isFile()) throw new ModuleError(`'${p}' is not a file`);
    await rm(abs);
    return { summary: `deleted ${this.display(abs)}`, output: { path: this.display(abs) } };
  }
}

function str(v: Parameters[string] | undefined): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

function required(params: Parameters, name: string): string {
  const v = str(params[name]);
  if (v === undefined) throw new ModuleError(`missing parameter '${name}'`);
  return v;
}

function fsFailure(err: unknown, p: string): ModuleError {
  const code = err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
  if (code === "ENOENT") return new ModuleError(`'${p}' does not exist`, false, { cause: err });
  if (code === "ENOTDIR") return new ModuleError(`'${p}' is not a directory`, false, { cause: err });
  if (code === "EACCES" || code === "EPERM") return new ModuleError(`permission denied for '${p}'`, false, { cause: err });
  if (err instanceof ModuleError) return err;
  // EBUSY, EMFILE and friends can clear up on their own
  return new ModuleError(err instanceof Error ? err.message : String(err), true, { cause: err });
}
