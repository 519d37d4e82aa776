export function uniqueFilter<T>(value: T, index: number, array: T[]): boolean {
  return array.indexOf(value) === index;
}

type ConfigEnv = { [key: string]: string | null };
type PreparedEnv = { [key: string]: string | undefined };

/**
 * Usually, we get from config object a object with string values or null, but to pass it to execa
 * we need to convert "null" values to "undefined"
 */
export function prepareEnvVars(env: ConfigEnv | undefined): PreparedEnv {
  if (env === undefined) {
    return {};
  }

  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value ?? undefined;
  }
  return result;
}

/**
 * Expands environment variables in a string
 * Example: "Hello ${env:USER}" -> "Hello john"
 */
export function expandEnvVars(value: string): string {
  return value.replace(/\${env:([^}]+)}/g, (match, name: string) => {
    return process.env[name] ?? match;
  });
}

/**
 * 32-bit FNV-1a over the UTF-16 code units of the string. Stable across runs and platforms,
 * unlike anything based on object identity.
 */
export function stableHash(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Uppercase zero-padded hex, like printf("%08X")
 */
export function hex8(value: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(8, "0");
}

/**
 * Sorts strings by UTF-16 code units so output doesn't depend on the current locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

export function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const item of a) {
    if (!b.has(item)) {
      return false;
    }
  }
  return true;
}

export function arraysEqual<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}
