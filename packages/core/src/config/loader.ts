import { readFile } from 'node:fs/promises';
import { EngineConfigSchema, type EngineConfig } from './schema.js';
import { ValidationError } from '../errors/index.js';
import { isProxyUrl } from '../session/proxy-pool.js';

/**
 * Validate a configuration object and apply defaults
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid engine configuration: ${result.error.message}`, {
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

function positiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Environment overrides applied on top of a parsed configuration
 *
 * - PROTRACE_RENDER_EXECUTABLE: browser binary for the render strategy
 * - PROTRACE_REQUEST_DEADLINE_MS: overall per-request deadline
 * - PROTRACE_PROXY_URLS: comma-separated proxy URLs, replacing the configured list
 */
export function applyEnvOverrides(config: EngineConfig, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const deadline = positiveInt(env.PROTRACE_REQUEST_DEADLINE_MS);
  const executablePath = env.PROTRACE_RENDER_EXECUTABLE?.trim();
  const proxyUrls = env.PROTRACE_PROXY_URLS?.split(',').map((url) => url.trim()).filter(Boolean);
  const invalid = proxyUrls?.find((url) => !isProxyUrl(url));
  if (invalid !== undefined) {
    throw new ValidationError('PROTRACE_PROXY_URLS contains an entry that is not an http(s) proxy URL', {
      position: proxyUrls?.indexOf(invalid),
    });
  }
  return {
    ...config,
    proxies: { ...config.proxies, ...(proxyUrls && proxyUrls.length > 0 && { servers: proxyUrls }) },
    ladder: { ...config.ladder, ...(deadline !== undefined && { requestDeadlineMs: deadline }) },
    render: { ...config.render, ...(executablePath && { executablePath }) },
  };
}

/**
 * Read a JSON configuration file.
 * The path defaults to PROTRACE_CONFIG.
 */
export async function loadEngineConfig(
  path: string | undefined = process.env.PROTRACE_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  if (!path) {
    throw new ValidationError('No configuration path given and PROTRACE_CONFIG is not set');
  }
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Configuration file ${path} is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return applyEnvOverrides(parseEngineConfig(raw), env);
}
