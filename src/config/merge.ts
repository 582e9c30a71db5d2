/**
 * Layered configuration trees
 *
 * Layers are untyped JSON-like trees. They are folded in ascending precedence
 * and only the final tree is typed (see validate.ts).
 */

export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

export function isConfigTree(value: unknown): value is ConfigTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursive merge over plain objects. `override` wins key by key; arrays and
 * scalars replace. Neither input is mutated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = structuredClone(base);

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    if (isConfigTree(existing) && isConfigTree(value)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = structuredClone(value);
    }
  }

  return result;
}

/**
 * Fold layers lowest precedence first.
 */
export function mergeLayers(layers: ConfigTree[]): ConfigTree {
  return layers.reduce<ConfigTree>((merged, layer) => deepMerge(merged, layer), {});
}

/**
 * `REQUEST_TIMEOUT_SECS` → `requestTimeoutSecs`
 */
export function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .split('_')
    .filter((word) => word.length > 0)
    .map((word, index) => (index === 0 ? word : word[0].toUpperCase() + word.slice(1)))
    .join('');
}

const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Numerals become numbers only when the number prints back as the same text;
 * `007123` and `1.10` stay strings so string fields receive them unchanged.
 */
export function parseScalar(raw: string): string | number | boolean {
  const lowered = raw.toLowerCase();
  if (lowered === 'true') {
    return true;
  }
  if (lowered === 'false') {
    return false;
  }
  if (NUMERIC.test(raw) && String(Number(raw)) === raw) {
    return Number(raw);
  }
  return raw;
}

/**
 * Build a layer from environment variables.
 *
 * `APP__SERVER__PORT=9000` becomes `{ server: { port: 9000 } }`; the prefix
 * matches in any case. Variables that name fewer than two segments after the
 * prefix (such as `APP__ENV`) are not configuration fields and are skipped.
 */
export function parseEnvLayer(
  env: Record<string, string | undefined>,
  prefix = 'APP',
  separator = '__'
): ConfigTree {
  const layer: ConfigTree = {};

  for (const [name, raw] of Object.entries(env)) {
    if (raw === undefined) {
      continue;
    }
    const [head, ...segments] = name.split(separator);
    if (
      head.toUpperCase() !== prefix.toUpperCase() ||
      segments.length < 2 ||
      segments.some((s) => s.length === 0)
    ) {
      continue;
    }
    setPath(layer, segments.map(toCamelCase), parseScalar(raw));
  }

  return layer;
}

function setPath(tree: ConfigTree, path: string[], value: ConfigValue): void {
  let node = tree;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isConfigTree(child)) {
      node = child;
    } else {
      const created: ConfigTree = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}
