import fp from 'fastify-plugin';

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  nodeEnv: string;
  trustProxy: boolean;
  corsOrigin: string;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

const validLogLevels: readonly AppConfig['logLevel'][] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export function isLogLevel(value: string): value is AppConfig['logLevel'] {
  return validLogLevels.some((level) => level === value);
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? '3000';
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  // HOST (simple string, no validation)
  const host = getValue('HOST') ?? '0.0.0.0';

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: AppConfig['logLevel'] = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(
      `LOG_LEVEL must be one of ${validLogLevels.join(', ')}, got: ${getValue('LOG_LEVEL')}`,
    );
  }

  // NODE_ENV (simple string, no validation)
  const nodeEnv = getValue('NODE_ENV') ?? 'production';

  // Parse TRUST_PROXY (boolean, default false)
  const trustProxyStr = (getValue('TRUST_PROXY') ?? 'false').toLowerCase();
  let trustProxy: boolean;
  if (trustProxyStr === 'true') {
    trustProxy = true;
  } else if (trustProxyStr === 'false') {
    trustProxy = false;
  } else {
    errors.push(`TRUST_PROXY must be 'true' or 'false', got: ${getValue('TRUST_PROXY')}`);
    trustProxy = false; // Default fallback
  }

  // CORS_ORIGIN ('*' allows every origin)
  const corsOrigin = getValue('CORS_ORIGIN') ?? '*';

  // If there are any validation errors, throw a single error listing all of them
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    logLevel,
    nodeEnv,
    trustProxy,
    corsOrigin,
  };
}

export default fp(
  async function configPlugin(fastify) {
    const config = loadConfig(process.env);

    fastify.log.info(config, 'Configuration loaded');

    // Decorate Fastify instance with the config
    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
