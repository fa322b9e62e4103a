import { readFile, stat } from "node:fs/promises";
import path from "node:path";

export interface UnitPathAdapter {
  resolve(...parts: string[]): string;
  dirname(path: string): string;
}

/** File access for the unit loader; the CLI uses the file system, tests use memory. */
export interface UnitHost {
  path: UnitPathAdapter;
  readFile(path: string): Promise<string>;
  fileExists(path: string): Promise<boolean>;
}

export const createFsUnitHost = (): UnitHost => {
  const fileCache = new Map<string, boolean>();

  const fileExists = async (filePath: string): Promise<boolean> => {
    const cached = fileCache.get(filePath);
    if (typeof cached === "boolean") {
      return cached;
    }
    const result = await stat(filePath)
      .then((info) => info.isFile())
      .catch(() => false);
    fileCache.set(filePath, result);
    return result;
  };

  return {
    path: {
      resolve: path.resolve,
      dirname: path.dirname,
    },
    readFile: (filePath: string) => readFile(filePath, "utf8"),
    fileExists,
  };
};

export const createMemoryUnitHost = ({
  files,
}: {
  files: Record<string, string>;
}): UnitHost => {
  const adapter: UnitPathAdapter = {
    resolve: (...parts) => path.posix.resolve("/", ...parts),
    dirname: path.posix.dirname,
  };
  const normalized = new Map(
    Object.entries(files).map(([filePath, contents]) => [
      adapter.resolve(filePath),
      contents,
    ]),
  );

  return {
    path: adapter,
    readFile: async (filePath: string) => {
      const resolved = adapter.resolve(filePath);
      const file = normalized.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
    fileExists: async (filePath: string) => normalized.has(adapter.resolve(filePath)),
  };
};
