import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import {
  GatehouseConfigSchema,
  HITL_MODES,
  type GatehouseConfig,
  type GatehouseConfigInput,
  type HitlMode,
} from './types.js';
import { ConfigError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHitlMode(value: string): value is HitlMode {
  return HITL_MODES.some(mode => mode === value);
}

export class ConfigManager {
  private config: GatehouseConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.gatehouse');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: GatehouseConfigInput): GatehouseConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.gatehouse.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = GatehouseConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): GatehouseConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Write a commented project config if none exists. Returns the path.
   */
  createDefaultProjectConfig(): string {
    const configPath = join(this.projectDir, '.gatehouse.yaml');
    if (!existsSync(configPath)) {
      mkdirSync(this.projectDir, { recursive: true });
      const template = `# gatehouse project configuration
orchestrator:
  tasks: [excel, word, ppt]
  maxAttemptsPerTask: 3
  overallPolicy: iep

gates:
  acc:
    enableRunawaySeal: true
    runawayThreshold: 5

hitl:
  mode: seeded
  seed: 7
  pContinue: 1.0
`;
      writeFileSync(configPath, template, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env = process.env;
    const patch: RawConfig = {};

    if (env.GATEHOUSE_LOG_LEVEL) {
      patch.logging = { level: env.GATEHOUSE_LOG_LEVEL };
    }

    const hitl: RawConfig = {};
    if (env.GATEHOUSE_HITL_MODE) {
      if (!isHitlMode(env.GATEHOUSE_HITL_MODE)) {
        throw new ConfigError(
          `GATEHOUSE_HITL_MODE must be one of ${HITL_MODES.join(', ')} (got "${env.GATEHOUSE_HITL_MODE}")`,
        );
      }
      hitl.mode = env.GATEHOUSE_HITL_MODE;
    }
    if (env.GATEHOUSE_HITL_SEED) {
      const seed = Number(env.GATEHOUSE_HITL_SEED);
      if (!Number.isInteger(seed)) {
        throw new ConfigError(`GATEHOUSE_HITL_SEED must be an integer (got "${env.GATEHOUSE_HITL_SEED}")`);
      }
      hitl.seed = seed;
    }
    if (Object.keys(hitl).length > 0) patch.hitl = hitl;

    const orchestrator: RawConfig = {};
    if (env.GATEHOUSE_AUDIT_PATH) orchestrator.auditPath = env.GATEHOUSE_AUDIT_PATH;
    if (env.GATEHOUSE_ARTIFACT_DIR) orchestrator.artifactDir = env.GATEHOUSE_ARTIFACT_DIR;
    if (Object.keys(orchestrator).length > 0) patch.orchestrator = orchestrator;

    return this.deepMerge(raw, patch);
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) continue;
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
