export interface ServerSettings {
  port: number;
  corsOrigin: string;
  networkConfigPath: string;
  reportPath: string;
  prometheusEnabled: boolean;
}

function parsePort(value: string | undefined): number {
  const normalized = value?.trim();
  if (!normalized) return 3001;
  const port = Number(normalized);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${normalized}`);
  }
  return port;
}

export function resolveSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return {
    port: parsePort(env.PORT),
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5173',
    networkConfigPath: env.NETWORK_CONFIG?.trim() || 'network_config.yml',
    reportPath: env.REPORT_PATH?.trim() || 'output/simulation_report.csv',
    prometheusEnabled: env.PROMETHEUS_ENABLED?.trim().toLowerCase() === 'true',
  };
}
