import fs from "node:fs";

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === "\"" || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

export function readEnvFile(filePath: string): Record<string, string> {
  try {
    const raw = fs.readFileSync(filePath, "utf8");
    const output: Record<string, string> = {};

    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (trimmed.length === 0 || trimmed.startsWith("#")) {
        continue;
      }

      const withoutExport = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed;
      const separator = withoutExport.indexOf("=");
      if (separator <= 0) {
        continue;
      }

      const key = withoutExport.slice(0, separator).trim();
      const value = unquote(withoutExport.slice(separator + 1).trim());
      if (key.length === 0) {
        continue;
      }

      output[key] = value;
    }

    return output;
  } catch {
    return {};
  }
}

/** Values already present in `env` win over the file. */
export function mergeEnvFile(env: NodeJS.ProcessEnv, filePath: string | undefined): NodeJS.ProcessEnv {
  if (!filePath || filePath.trim().length === 0) {
    return env;
  }

  return {
    ...readEnvFile(filePath),
    ...env
  };
}
