import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import { LookupError } from "../../errors";
import { isWorkflowEntity } from "../workflow/workflow";
import type {
  LoadedWorkflow,
  SerializationSettings,
} from "../workflow/serialization";

// ES module scripts (.mjs, .mts) cannot be loaded from the CommonJS build.
const SCRIPT_EXTENSIONS = [".js", ".cjs", ".ts", ".cts"];

export interface LoadedModule {
  readonly name: string;
  readonly file: string;
  readonly settings: SerializationSettings;
  readonly exports: Readonly<Record<string, unknown>>;
}

/**
 * ModuleLoaderService imports workflow scripts by dotted module name, the way
 * they are addressed on the command line, and looks up their exports.
 */
@Injectable()
export class ModuleLoaderService {
  private readonly searchRoots: string[] = [];
  private readonly modules = new Map<string, LoadedModule>();

  /**
   * Makes `root` resolvable for the duration of `fn`. The root is released
   * when `fn` settles, whether it resolved or threw.
   */
  async withSearchPath<T>(root: string, fn: () => Promise<T>): Promise<T> {
    const resolvedRoot = path.resolve(root);
    this.searchRoots.push(resolvedRoot);
    try {
      return await fn();
    } finally {
      const index = this.searchRoots.lastIndexOf(resolvedRoot);
      if (index !== -1) {
        this.searchRoots.splice(index, 1);
      }
    }
  }

  getSearchPath(): readonly string[] {
    return [...this.searchRoots];
  }

  async importModule(
    name: string,
    settings: SerializationSettings
  ): Promise<LoadedModule> {
    const cached = this.modules.get(name);
    if (cached) {
      return cached;
    }

    const file = await this.resolveModuleFile(name);
    const namespace: unknown = await import(file);
    const loaded: LoadedModule = {
      name,
      file,
      settings,
      exports: toExportMap(namespace),
    };
    this.modules.set(name, loaded);
    return loaded;
  }

  loadObject(qualifiedName: string): LoadedWorkflow {
    const separator = qualifiedName.lastIndexOf(".");
    if (separator <= 0 || separator === qualifiedName.length - 1) {
      throw new LookupError(
        `Expected <module>.<name>, received ${qualifiedName}`
      );
    }

    const moduleName = qualifiedName.slice(0, separator);
    const exportName = qualifiedName.slice(separator + 1);
    const loaded = this.modules.get(moduleName);
    if (!loaded) {
      throw new LookupError(`Module ${moduleName} has not been loaded`);
    }

    if (!Object.hasOwn(loaded.exports, exportName)) {
      throw new LookupError(
        `Module ${moduleName} does not export ${exportName}`
      );
    }

    const entity = loaded.exports[exportName];
    if (!isWorkflowEntity(entity)) {
      throw new LookupError(`${qualifiedName} is not a workflow`);
    }

    return {
      qualifiedName,
      moduleName,
      exportName,
      sourceFile: loaded.file,
      settings: loaded.settings,
      entity,
    };
  }

  private async resolveModuleFile(name: string): Promise<string> {
    const segments = name.split(".");
    const roots = [...this.searchRoots].reverse();

    for (const root of roots) {
      const bases = [path.join(root, ...segments), path.join(root, name)];
      for (const base of bases) {
        for (const extension of SCRIPT_EXTENSIONS) {
          const candidate = `${base}${extension}`;
          if (await isFile(candidate)) {
            return candidate;
          }
        }
      }
    }

    throw new LookupError(
      `Cannot find module ${name} in ${roots.length > 0 ? roots.join(", ") : "<empty search path>"}`
    );
  }
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    return stats.isFile();
  } catch {
    return false;
  }
}

function toExportMap(namespace: unknown): Record<string, unknown> {
  if (typeof namespace !== "object" || namespace === null) {
    return {};
  }

  const result: Record<string, unknown> = {};
  // CommonJS scripts surface their exports under `default` when imported.
  if ("default" in namespace) {
    const fallback = namespace.default;
    if (typeof fallback === "object" && fallback !== null) {
      Object.assign(result, fallback);
    }
  }
  Object.assign(result, namespace);
  return result;
}
