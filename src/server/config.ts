import { z } from 'zod';

const DEFAULT_SERVER_ID = 'MicrosoftWindows.Client.Core_cw5n1h2txyewy_com.microsoft.windows.ai.mcpServer_file-mcp-server';

const ms = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0']).default(fallback ? 'true' : 'false').transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8790),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  RELAY_BASE_URL: z.string().url().default('http://localhost:8787'),
  LOCAL_MCP_CONNECT_TIMEOUT_MS: ms(30_000),
  LOCAL_MCP_CONNECT_POLL_MS: ms(1_000),
  LOCAL_MCP_READY_TIMEOUT_MS: ms(10_000),
  LOCAL_MCP_READY_POLL_MS: ms(500),
  LOCAL_MCP_SETTLE_MS: z.coerce.number().int().min(0).default(1_000),
  LOCAL_MCP_SINGLE_FLIGHT: flag(true),
  LOCAL_MCP_SERVER_ID: z.string().min(1).default(DEFAULT_SERVER_ID),
  LOCAL_MCP_CLIENT_NAME: z.string().min(1).default('desktop-mcp-broker'),
  LOCAL_MCP_CLIENT_VERSION: z.string().min(1).default('1.0.0'),
  WNS_TENANT_ID: z.string().default(''),
  WNS_CLIENT_ID: z.string().default(''),
  WNS_CLIENT_SECRET: z.string().default(''),
  WNS_TOKEN_ENDPOINT: z.string().url().optional(),
  WNS_SCOPE: z.string().min(1).default('https://wns.windows.com/.default'),
  WNS_TOKEN_MARGIN_SECONDS: z.coerce.number().int().min(0).default(300)
});

export interface BrokerConfig {
  port: number;
  logLevel: string;
  relay: {
    baseUrl: string;
  };
  localMcp: {
    connectTimeoutMs: number;
    connectPollMs: number;
    readyTimeoutMs: number;
    readyPollMs: number;
    settleMs: number;
    singleFlight: boolean;
    serverId: string;
    clientInfo: { name: string; version: string };
  };
  wns: {
    tenantId: string;
    clientId: string;
    clientSecret: string;
    tokenEndpoint: string;
    scope: string;
    tokenMarginSeconds: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  // empty strings count as unset
  const raw = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const e = envSchema.parse(raw);
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    relay: {
      baseUrl: e.RELAY_BASE_URL.replace(/\/+$/, '')
    },
    localMcp: {
      connectTimeoutMs: e.LOCAL_MCP_CONNECT_TIMEOUT_MS,
      connectPollMs: e.LOCAL_MCP_CONNECT_POLL_MS,
      readyTimeoutMs: e.LOCAL_MCP_READY_TIMEOUT_MS,
      readyPollMs: e.LOCAL_MCP_READY_POLL_MS,
      settleMs: e.LOCAL_MCP_SETTLE_MS,
      singleFlight: e.LOCAL_MCP_SINGLE_FLIGHT,
      serverId: e.LOCAL_MCP_SERVER_ID,
      clientInfo: { name: e.LOCAL_MCP_CLIENT_NAME, version: e.LOCAL_MCP_CLIENT_VERSION }
    },
    wns: {
      tenantId: e.WNS_TENANT_ID,
      clientId: e.WNS_CLIENT_ID,
      clientSecret: e.WNS_CLIENT_SECRET,
      tokenEndpoint: e.WNS_TOKEN_ENDPOINT ?? `https://login.microsoftonline.com/${encodeURIComponent(e.WNS_TENANT_ID || 'common')}/oauth2/v2.0/token`,
      scope: e.WNS_SCOPE,
      tokenMarginSeconds: e.WNS_TOKEN_MARGIN_SECONDS
    }
  };
}

export function isWnsConfigured(config: BrokerConfig['wns']): boolean {
  return Boolean(config.tenantId && config.clientId && config.clientSecret);
}
