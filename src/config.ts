import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    backendPort: number;
  };
  renderer: {
    binary?: string;
    wellKnownPath: string;
    searchName: string;
    script?: string;
    helperPaths: string[];
    helperPathEnv: string;
  };
  encoder: {
    binary: string;
  };
  render: {
    seconds: number;
    baseFps: number;
    finalFps: number;
    size: 720 | 1080 | 1440 | 2160;
    axis: 'X' | 'Y' | 'Z';
    quality: 'fast' | 'standard' | 'ultra';
    format: 'mp4' | 'webm';
  };
  limits: {
    maxModelBytes: number;
    maxUploadBytes: number;
    allowedExtensions: string[];
    maxConcurrentPerOwner: number;
    cancelGraceMs: number;
  };
  eta: {
    window: number;
    warmup: number;
    safetyFactor: number;
    stallThreshold: number;
    stallDamping: number;
  };
  storage: {
    root: string;
    databasePath: string;
    retentionMinutes: number;
    sweepIntervalSeconds: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    backendPort: z.number().int().min(1024).max(65535),
  }),
  renderer: z.object({
    binary: z.string().min(1).optional(),
    wellKnownPath: z.string().min(1),
    searchName: z.string().min(1),
    script: z.string().min(1).optional(),
    helperPaths: z.array(z.string().min(1)),
    helperPathEnv: z.string().min(1),
  }),
  encoder: z.object({
    binary: z.string().min(1, 'Encoder binary must not be empty'),
  }),
  render: z.object({
    seconds: z.number().positive().max(600),
    baseFps: z.number().int().min(1).max(120),
    finalFps: z.number().int().min(1).max(120),
    size: z.union([z.literal(720), z.literal(1080), z.literal(1440), z.literal(2160)]),
    axis: z.enum(['X', 'Y', 'Z']),
    quality: z.enum(['fast', 'standard', 'ultra']),
    format: z.enum(['mp4', 'webm']),
  }),
  limits: z.object({
    maxModelBytes: z.number().int().positive(),
    maxUploadBytes: z.number().int().positive(),
    allowedExtensions: z.array(z.string().startsWith('.')).min(1),
    maxConcurrentPerOwner: z.number().int().min(1).max(100),
    cancelGraceMs: z.number().int().min(0).max(30000),
  }),
  eta: z.object({
    window: z.number().int().min(1).max(500),
    warmup: z.number().int().min(1).max(500),
    safetyFactor: z.number().min(1).max(10),
    stallThreshold: z.number().min(1).max(10),
    stallDamping: z.number().min(0).max(1),
  }),
  storage: z.object({
    root: z.string().min(1),
    databasePath: z.string().min(1),
    retentionMinutes: z.number().int().min(1),
    sweepIntervalSeconds: z.number().int().min(5),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --renderer-bin /usr/bin/blender --backend-port 3001 --debug
 */
function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Enum values that are out of range fall back to the default
 */
function pickOne<T extends string | number>(value: string, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((candidate) => String(candidate) === value);
  return match ?? fallback;
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Validates configuration against schema and exits if invalid.
 */
export function getConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return cli;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const value = getString(cliKey, envKey, '');
    return value === '' ? undefined : value;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return Number(cli);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const cli = cliArgs[cliKey];
    const value = typeof cli === 'string' ? cli : env[envKey];
    if (!value) return defaultValue;
    return value.split(',').map(s => s.trim()).filter(Boolean);
  };

  const script = getOptionalString('renderer-script', 'RENDERER_SCRIPT');
  const resolvedScript = script ? path.resolve(script) : undefined;

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'turntable-render-orchestrator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      backendPort: getNumber('backend-port', 'BACKEND_PORT', 3001),
    },
    renderer: {
      binary: getOptionalString('renderer-bin', 'RENDERER_BIN'),
      wellKnownPath: getString(
        'renderer-well-known-path',
        'RENDERER_WELL_KNOWN_PATH',
        '/Applications/Blender.app/Contents/MacOS/Blender'
      ),
      searchName: getString('renderer-search-name', 'RENDERER_SEARCH_NAME', 'blender'),
      script: resolvedScript,
      // Helper modules next to the turntable script stay importable by default
      helperPaths: getStringArray(
        'renderer-helper-paths',
        'RENDERER_HELPER_PATHS',
        resolvedScript ? [path.dirname(resolvedScript)] : []
      ),
      helperPathEnv: getString('renderer-helper-env', 'RENDERER_HELPER_ENV', 'PYTHONPATH'),
    },
    encoder: {
      binary: getString('ffmpeg-bin', 'FFMPEG_BIN', 'ffmpeg'),
    },
    render: {
      seconds: getNumber('render-seconds', 'RENDER_SECONDS', 10),
      baseFps: getNumber('render-base-fps', 'RENDER_BASE_FPS', 11),
      finalFps: getNumber('render-final-fps', 'RENDER_FINAL_FPS', 25),
      size: pickOne(getString('render-size', 'RENDER_SIZE', '1080'), [720, 1080, 1440, 2160] as const, 1080),
      axis: pickOne(getString('render-axis', 'RENDER_AXIS', 'Z').toUpperCase(), ['X', 'Y', 'Z'] as const, 'Z'),
      quality: pickOne(
        getString('render-quality', 'RENDER_QUALITY', 'ultra').toLowerCase(),
        ['fast', 'standard', 'ultra'] as const,
        'ultra'
      ),
      format: pickOne(getString('render-format', 'RENDER_FORMAT', 'mp4').toLowerCase(), ['mp4', 'webm'] as const, 'mp4'),
    },
    limits: {
      maxModelBytes: getNumber('max-model-bytes', 'MAX_MODEL_BYTES', 100 * 1024 * 1024),
      maxUploadBytes: getNumber('max-upload-bytes', 'MAX_UPLOAD_BYTES', 512 * 1024 * 1024),
      allowedExtensions: getStringArray('allowed-extensions', 'ALLOWED_EXTENSIONS', ['.stl']).map(ext => ext.toLowerCase()),
      maxConcurrentPerOwner: getNumber('max-concurrent-renders', 'MAX_CONCURRENT_RENDERS_PER_OWNER', 5),
      cancelGraceMs: getNumber('cancel-grace-ms', 'CANCEL_GRACE_MS', 500),
    },
    eta: {
      window: getNumber('eta-window', 'ETA_WINDOW', 20),
      warmup: getNumber('eta-warmup', 'ETA_WARMUP', 5),
      safetyFactor: getNumber('eta-safety-factor', 'ETA_SAFETY_FACTOR', 1.25),
      stallThreshold: getNumber('eta-stall-threshold', 'ETA_STALL_THRESHOLD', 1.5),
      stallDamping: getNumber('eta-stall-damping', 'ETA_STALL_DAMPING', 0.5),
    },
    storage: {
      root: path.resolve(getString('storage-root', 'STORAGE_ROOT', 'storage')),
      databasePath: getString('database-path', 'DATABASE_PATH', path.join('data', 'renders.db')),
      retentionMinutes: getNumber('retention-minutes', 'RETENTION_MINUTES', 60),
      sweepIntervalSeconds: getNumber('sweep-interval', 'SWEEP_INTERVAL_SECONDS', 300),
    },
  };

  // Validate configuration
  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach(err => {
        const key = err.path.join('.');
        console.error(`  • ${key || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Frame rates must be whole numbers');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║          Turntable Render Orchestrator - Configuration          ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🎬 Renderer: ${config.renderer.binary ?? `${config.renderer.wellKnownPath} | $PATH:${config.renderer.searchName}`}`);
  if (config.renderer.script) {
    console.error(`   Script: ${config.renderer.script}`);
  }
  console.error(`🎞️  Encoder: ${config.encoder.binary}`);

  const { render } = config;
  const conversion = render.baseFps !== render.finalFps ? ` → ${render.finalFps} fps` : '';
  console.error(`\n⚙️  Render: ${render.seconds}s @ ${render.baseFps} fps${conversion} | ${render.size}px | ${render.quality} | ${render.format}`);
  console.error(`🚦 Limits: ${config.limits.maxConcurrentPerOwner} concurrent per owner | model ≤ ${Math.round(config.limits.maxModelBytes / (1024 * 1024))}MB`);
  console.error(`⏱️  ETA: window ${config.eta.window}, warmup ${config.eta.warmup}, ×${config.eta.safetyFactor}`);

  console.error(`\n💾 Storage: ${config.storage.root}`);
  console.error(`   Database: ${config.storage.databasePath}`);
  console.error(`🌐 Backend: http://localhost:${config.server.backendPort}`);

  console.error('\n' + '─'.repeat(68));
}
