export interface CheckResult {
  status: "ok" | "error";
  latencyMs?: number;
  error?: string;
}

export interface HealthStatus {
  status: "ok" | "degraded";
  version: string;
  uptime: number;
  checks: {
    database?: CheckResult;
    redis?: CheckResult;
  };
}

export interface ReadinessStatus {
  ready: boolean;
  reason?: string;
}

export interface Pingable {
  ping(): Promise<unknown>;
}

export interface HealthDependencies {
  database?: Pingable;
  redis?: Pingable;
}

const startTime = Date.now();

async function check(dependency: Pingable): Promise<CheckResult> {
  const start = Date.now();
  try {
    await dependency.ping();
    return { status: "ok", latencyMs: Date.now() - start };
  } catch (error) {
    return { status: "error", error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Detailed health status. Never fails; a broken dependency shows as `degraded`.
 */
export async function getHealth(deps: HealthDependencies, version: string): Promise<HealthStatus> {
  const checks: HealthStatus["checks"] = {};
  if (deps.database) checks.database = await check(deps.database);
  if (deps.redis) checks.redis = await check(deps.redis);

  const hasError = Object.values(checks).some((c) => c.status === "error");

  return {
    status: hasError ? "degraded" : "ok",
    version,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
  };
}

/**
 * Ready when every configured dependency answers a ping.
 */
export async function getReadiness(deps: HealthDependencies): Promise<ReadinessStatus> {
  if (deps.database && (await check(deps.database)).status === "error") {
    return { ready: false, reason: "Database not reachable" };
  }
  if (deps.redis && (await check(deps.redis)).status === "error") {
    return { ready: false, reason: "Redis not connected" };
  }
  return { ready: true };
}
