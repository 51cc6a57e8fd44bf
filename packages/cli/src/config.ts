// Environment defaults for the CLI, read once and cached.
export interface CliEnv {
  readonly strict: boolean;
  readonly externals: readonly string[];
  readonly debug: boolean;
}

let cached: CliEnv | undefined;

function flag(name: string): boolean {
  const value = (process.env[name] || "").toLowerCase();
  return value === "1" || value === "true";
}

function list(name: string): string[] {
  const value = process.env[name];
  return value ? value.split(",").map((entry) => entry.trim()).filter(Boolean) : [];
}

export function cliEnv(): CliEnv {
  if (cached === undefined) {
    cached = Object.freeze({
      strict: flag("GADGETC_STRICT"),
      externals: Object.freeze(list("GADGETC_EXTERNALS")),
      debug: flag("GADGETC_DEBUG"),
    });
  }
  return cached;
}

export function resetCliEnvForTest(): void {
  cached = undefined;
}
