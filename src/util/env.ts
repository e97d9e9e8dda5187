/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit STAGE wins; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // Absence of a Lambda execution env implies local
  if (process.env.IS_LOCAL === "true") return true;
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return !isLambda;
}

export interface GetEnvVarOptions {
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads a raw environment variable.
 * - With `stageAware` (default), checks NAME__<stage> first (e.g. SIGNAL_OUTPUT_DIR__prod), then NAME.
 * - Empty strings count as unset. Throws when `required` and nothing is found.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") return candidate;

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

function getParsed<T>(
  name: string,
  defaultValue: T,
  parse: (raw: string) => T
): T {
  const raw = getEnvVar(name);
  return raw === undefined ? defaultValue : parse(raw);
}

export function getString(name: string, defaultValue: string): string {
  return getParsed(name, defaultValue, raw => raw);
}

export function getNumber(name: string, defaultValue: number): number {
  return getParsed(name, defaultValue, raw => {
    const n = Number(raw);
    if (Number.isNaN(n))
      throw new Error(`Env var ${name} is not a number: ${raw}`);
    return n;
  });
}

export function getBoolean(name: string, defaultValue: boolean): boolean {
  return getParsed(name, defaultValue, raw => {
    const lowered = raw.toLowerCase();
    if (["1", "true", "yes", "y"].includes(lowered)) return true;
    if (["0", "false", "no", "n"].includes(lowered)) return false;
    throw new Error(`Env var ${name} is not a boolean: ${raw}`);
  });
}
