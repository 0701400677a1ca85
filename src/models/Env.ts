export type EnvCastType = "string" | "number" | "boolean" | "date";

export interface EnvVariableOptions<T = unknown> {
  /** Default value returned when the environment variable is not set */
  defaultValue?: T;
  /** How should the string value coming from the source be cast */
  cast?: EnvCastType;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

function castValue(
  raw: string | undefined,
  cast: EnvCastType | undefined,
): string | number | boolean | Date | undefined {
  if (raw === undefined) return undefined;

  switch (cast) {
    case "number": {
      const n = parseFloat(raw);
      return isNaN(n) ? undefined : n;
    }
    case "boolean":
      return ["1", "true", "yes", "y"].includes(raw.toLowerCase());
    case "date": {
      const d = new Date(raw);
      return isNaN(d.getTime()) ? undefined : d;
    }
    case "string":
    default:
      return raw;
  }
}

/**
 * Environment variable reader with per-key defaults and casting. Reads
 * `process.env` unless another source is given.
 */
export class Env {
  private registry: Map<string, EnvVariableOptions> = new Map();

  constructor(private readonly source: EnvSource = process.env) {}

  /**
   * Register an environment variable with optional metadata (default value & casting).
   */
  set<T>(key: string, options: EnvVariableOptions<T>) {
    this.registry.set(key, options);
  }

  /**
   * Retrieve an environment variable value applying casting & default value logic.
   * Priority: cast source value -> registered default -> given default.
   */
  get(key: string, defaultValue?: unknown): unknown {
    const registered = this.registry.get(key);
    const casted = castValue(this.source[key], registered?.cast);

    if (casted !== undefined) {
      return casted;
    }

    if (registered && registered.defaultValue !== undefined) {
      return registered.defaultValue;
    }

    return defaultValue;
  }
}
