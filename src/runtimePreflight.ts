export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const MIN_SESSION_SECRET_LENGTH = 32;

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV is not set');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv} is not production (set ALLOW_NON_PROD=1 to skip)`);
  }

  const storageDriver = env.STORAGE_DRIVER?.trim();
  if (isBlank(storageDriver)) {
    errors.push('STORAGE_DRIVER is not set; expected postgres or memory');
  } else if (storageDriver !== 'postgres' && storageDriver !== 'memory') {
    errors.push(`STORAGE_DRIVER=${storageDriver} is invalid; expected postgres or memory`);
  }

  if (storageDriver === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push(
      'memory storage loses all data on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
    );
  }

  if (storageDriver === 'postgres') {
    const databaseUrl = env.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push('DATABASE_URL is required when STORAGE_DRIVER=postgres');
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push('DATABASE_URL must start with postgres:// or postgresql://');
    }
  }

  const sessionSecret = env.SESSION_SECRET?.trim() ?? '';
  if (sessionSecret.length === 0) {
    errors.push('SESSION_SECRET is not set');
  } else if (sessionSecret.length < MIN_SESSION_SECRET_LENGTH) {
    errors.push(`SESSION_SECRET must be at least ${MIN_SESSION_SECRET_LENGTH} characters`);
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid; it must be a number`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel && !LOG_LEVELS.has(logLevel)) {
    errors.push(`LOG_LEVEL=${logLevel} is not a pino level`);
  }

  const pollInterval = env.REMINDER_POLL_INTERVAL_SEC?.trim();
  if (pollInterval && !/^\d+$/.test(pollInterval)) {
    errors.push(`REMINDER_POLL_INTERVAL_SEC=${pollInterval} must be a non-negative integer`);
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = [
    'Environment check failed before start-up:',
    ...errors.map((item) => `- ${item}`)
  ].join('\n');
  throw new Error(message);
}
