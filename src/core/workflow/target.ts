import path from "path";
import { ValidationError } from "../../errors";

export interface WorkflowTarget {
  readonly filename: string;
  readonly workflowName: string;
}

export interface ModuleLocation {
  /** Directory the module name is resolved against. */
  readonly searchRoot: string;
  /** Script path below the search root without its extension, dot separated. */
  readonly moduleName: string;
}

export function parseWorkflowTarget(input: string): WorkflowTarget {
  const parts = input.split(":");
  if (parts.length !== 2) {
    throw new ValidationError(
      `Input ${input} must be in format '<file>:<workflow>'`
    );
  }

  const [filename, workflowName] = parts;
  if (filename.length === 0 || workflowName.length === 0) {
    throw new ValidationError(
      `Input ${input} must name both a file and a workflow`
    );
  }

  return { filename, workflowName };
}

export function toModuleName(filename: string): string {
  const normalized = path.normalize(filename);
  const extension = path.extname(normalized);
  const withoutExtension = extension
    ? normalized.slice(0, -extension.length)
    : normalized;
  return withoutExtension.split(path.sep).filter(Boolean).join(".");
}

/**
 * Scripts below the working directory are named relative to it; anything
 * outside is named from the filesystem root.
 */
export function locateWorkflowModule(
  filename: string,
  cwd: string
): ModuleLocation {
  const absolute = path.resolve(cwd, filename);
  const relative = path.relative(cwd, absolute);
  const insideCwd =
    relative.length > 0 &&
    !relative.startsWith("..") &&
    !path.isAbsolute(relative);

  if (insideCwd) {
    return { searchRoot: cwd, moduleName: toModuleName(relative) };
  }

  const { root } = path.parse(absolute);
  return {
    searchRoot: root,
    moduleName: toModuleName(path.relative(root, absolute)),
  };
}
