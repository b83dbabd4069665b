import { z } from 'zod'

const durationSchema = z
  .string()
  .regex(/^\d+(ms|s|m|h)$/, 'expected a duration such as 500ms, 5s or 1m')

export const REFRESH_INTERVAL_VALUES = ['off', '30s', '1m', '2m', '5m'] as const
export const THEME_VALUES = ['dark', 'light', 'plain'] as const

export const DEFAULT_ENABLED_CHECKS = ['local_resources', 'internet', 'claude_api', 'opencode']

export const thresholdsConfigSchema = z.object({
  cpu_warning: z.number().min(0).max(100).default(70),
  cpu_critical: z.number().min(0).max(100).default(90),
  ram_warning: z.number().min(0).max(100).default(85),
  ram_critical: z.number().min(0).max(100).default(95),
  /** Free disk percentage below which the disk counts as low */
  low_disk_pct: z.number().min(0).max(100).default(10),
  gpu_warning: z.number().min(0).max(100).default(80),
  gpu_critical: z.number().min(0).max(100).default(95),
  slow_network_ms: z.number().int().positive().default(2000),
  many_terminals: z.number().int().nonnegative().default(10),
})

export const networkConfigSchema = z.object({
  primary: z.string().url().default('https://www.google.com'),
  fallback: z.string().url().default('https://1.1.1.1'),
})

export const vpnConfigSchema = z.object({
  /** Host that must stay reachable while a VPN is up; unset → VPN state is only reported */
  reference_host: z.string().url().optional(),
})

export const processConfigSchema = z.object({
  name: z.string().min(1).default('opencode'),
  /** A missing process is critical instead of informational */
  required: z.boolean().default(false),
  memory_limit_mb: z.number().positive().default(2000),
})

export const apiEndpointConfigSchema = z.object({
  url: z.string().url(),
  method: z.enum(['GET', 'HEAD']).default('GET'),
  /** Env var holding the key; requests go out unauthenticated without it */
  api_key_env: z.string().optional(),
  /** "authorization" sends `Bearer <key>`, any other header gets the raw key */
  auth_header: z.string().default('authorization'),
  headers: z.record(z.string()).default({}),
})

export const apisConfigSchema = z.object({
  claude_api: apiEndpointConfigSchema.default({
    url: 'https://api.anthropic.com/v1/models',
    api_key_env: 'ANTHROPIC_API_KEY',
    auth_header: 'x-api-key',
    headers: { 'anthropic-version': '2023-06-01' },
  }),
  openai_api: apiEndpointConfigSchema.default({
    url: 'https://api.openai.com/v1/models',
    api_key_env: 'OPENAI_API_KEY',
  }),
  google_api: apiEndpointConfigSchema.default({
    url: 'https://generativelanguage.googleapis.com/v1beta/models',
    api_key_env: 'GEMINI_API_KEY',
    auth_header: 'x-goog-api-key',
  }),
})

export const configSchema = z.object({
  enabled_checks: z.array(z.string()).default(DEFAULT_ENABLED_CHECKS),
  refresh_interval: z.enum(REFRESH_INTERVAL_VALUES).default('off'),
  theme: z.enum(THEME_VALUES).default('dark'),
  probe_timeout: durationSchema.default('5s'),
  /** Defaults to three probe timeouts */
  run_deadline: durationSchema.optional(),
  max_concurrency: z.number().int().min(1).default(8),
  thresholds: thresholdsConfigSchema.default({}),
  network: networkConfigSchema.default({}),
  vpn: vpnConfigSchema.default({}),
  process: processConfigSchema.default({}),
  apis: apisConfigSchema.default({}),
})

export type Config = z.infer<typeof configSchema>
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>
export type NetworkConfig = z.infer<typeof networkConfigSchema>
export type VpnConfig = z.infer<typeof vpnConfigSchema>
export type ProcessConfig = z.infer<typeof processConfigSchema>
export type ApiEndpointConfig = z.infer<typeof apiEndpointConfigSchema>
export type ApisConfig = z.infer<typeof apisConfigSchema>
export type Theme = (typeof THEME_VALUES)[number]
