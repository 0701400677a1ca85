export interface SafeStringifyOptions {
  space?: number;
  /** Containers nested deeper than this print as "[Object]" or "[Array]". */
  maxDepth?: number;
}

/**
 * JSON for log output. Never throws on values JSON.stringify rejects: cycles
 * print as "[Circular]", bigints and symbols as strings, functions as
 * "function()".
 */
export function safeStringify(
  value: unknown,
  options: SafeStringifyOptions = {},
): string {
  const maxDepth = options.maxDepth ?? Infinity;
  const ancestors = new Set<object>();

  const toJsonValue = (current: unknown, depth: number): unknown => {
    switch (typeof current) {
      case "function":
        return "function()";
      case "bigint":
      case "symbol":
        return current.toString();
      case "object":
        break;
      default:
        return current;
    }
    if (current === null) {
      return null;
    }
    if (current instanceof Date) {
      return Number.isNaN(current.getTime()) ? null : current.toISOString();
    }
    if (ancestors.has(current)) {
      return "[Circular]";
    }
    if (depth >= maxDepth) {
      return Array.isArray(current) ? "[Array]" : "[Object]";
    }

    ancestors.add(current);
    try {
      if (Array.isArray(current)) {
        return current.map((item) => toJsonValue(item, depth + 1));
      }
      return Object.fromEntries(
        Object.entries(current).map(([key, item]) => [
          key,
          toJsonValue(item, depth + 1),
        ]),
      );
    } finally {
      ancestors.delete(current);
    }
  };

  // undefined has no JSON form
  return (
    JSON.stringify(toJsonValue(value, 0), null, options.space) ?? String(value)
  );
}
