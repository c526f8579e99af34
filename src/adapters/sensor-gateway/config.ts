export interface SensorGatewayConfig {
  host: string;
  port: number;
  authToken: string | undefined;
  healthMaxAgeSeconds: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

export function loadSensorGatewayConfig(env: EnvSource = process.env): SensorGatewayConfig {
  return {
    host: parseOptionalString(env.SENSOR_GATEWAY_HOST) ?? "127.0.0.1",
    port: parsePositiveInt(env.SENSOR_GATEWAY_PORT, 8091, "SENSOR_GATEWAY_PORT"),
    authToken: parseOptionalString(env.SENSOR_GATEWAY_AUTH_TOKEN),
    // Three missed polls at the slowest interval
    healthMaxAgeSeconds: parsePositiveInt(
      env.SENSOR_GATEWAY_HEALTH_MAX_AGE_SECONDS,
      6 * 60 * 60,
      "SENSOR_GATEWAY_HEALTH_MAX_AGE_SECONDS"
    )
  };
}
