/// <reference types="node" />
import { z } from 'zod';
import { CriterionType } from '../models/types';

// =============================================================================
// MATCHING CONFIGURATION
// =============================================================================

/**
 * Options for the driver matching engine.
 * Several named configurations can exist; one is the default.
 */
export interface MatchingConfig {
  id: string;
  name: string;

  /** Order in which ranking criteria break ties (first = most important) */
  priorityOrder: CriterionType[];

  /** Drivers further than this from the pickup point are never considered */
  maxPickupDistanceMiles: number;

  /** Only the N nearest eligible drivers are ranked */
  candidatePoolSize: number;

  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
  id: 'default',
  name: 'Default Configuration',

  priorityOrder: [
    CriterionType.PICKUP_DISTANCE,  // 1. Closest driver to the pickup
    CriterionType.RATING,           // 2. Higher rated driver on ties
    CriterionType.IDLE_TIME         // 3. Longest-waiting driver, for fairness
  ],

  maxPickupDistanceMiles: 15,
  candidatePoolSize: 25,

  isDefault: true,
  createdAt: new Date(),
  updatedAt: new Date()
};

const MatchingConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  priorityOrder: z.array(z.nativeEnum(CriterionType)).min(1),
  maxPickupDistanceMiles: z.number().positive(),
  candidatePoolSize: z.number().int().min(1),
  isDefault: z.boolean()
});

// =============================================================================
// CONFIGURATION MANAGER
// =============================================================================

export class ConfigManager {
  private configs: Map<string, MatchingConfig> = new Map();
  private defaultConfigId: string = 'default';

  constructor(initial: MatchingConfig = DEFAULT_MATCHING_CONFIG) {
    this.configs.set(initial.id, { ...initial, priorityOrder: [...initial.priorityOrder], isDefault: true });
    this.defaultConfigId = initial.id;
  }

  /**
   * Get a configuration by ID, or return default if not found
   */
  getConfig(configId?: string): MatchingConfig {
    if (!configId) {
      return this.getDefaultConfig();
    }
    return this.configs.get(configId) || this.getDefaultConfig();
  }

  findConfig(configId: string): MatchingConfig | undefined {
    return this.configs.get(configId);
  }

  /**
   * Get the default configuration
   */
  getDefaultConfig(): MatchingConfig {
    return this.configs.get(this.defaultConfigId) || DEFAULT_MATCHING_CONFIG;
  }

  /**
   * Create or update a configuration
   */
  saveConfig(config: MatchingConfig): MatchingConfig {
    const parsed = MatchingConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new Error(`Invalid matching config: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    assertCompletePriorityOrder(config.priorityOrder);

    const now = new Date();
    const existingConfig = this.configs.get(config.id);

    const updatedConfig: MatchingConfig = {
      ...config,
      priorityOrder: [...config.priorityOrder],
      createdAt: existingConfig?.createdAt || now,
      updatedAt: now
    };

    // If this is being set as default, unset others
    if (updatedConfig.isDefault) {
      this.configs.forEach((c, id) => {
        if (id !== config.id && c.isDefault) {
          this.configs.set(id, { ...c, isDefault: false });
        }
      });
      this.defaultConfigId = config.id;
    } else if (config.id === this.defaultConfigId) {
      throw new Error('Cannot unset the default configuration. Set another as default first.');
    }

    this.configs.set(config.id, updatedConfig);
    return updatedConfig;
  }

  /**
   * Delete a configuration (cannot delete the default)
   */
  deleteConfig(configId: string): boolean {
    if (configId === this.defaultConfigId) {
      throw new Error('Cannot delete the default configuration. Set another as default first.');
    }
    return this.configs.delete(configId);
  }

  /**
   * List all configurations
   */
  listConfigs(): MatchingConfig[] {
    return Array.from(this.configs.values());
  }

  /**
   * Update the criteria priority order (admin function)
   */
  updatePriorityOrder(configId: string, newOrder: CriterionType[]): MatchingConfig {
    const config = this.getConfig(configId);
    return this.saveConfig({
      ...config,
      priorityOrder: newOrder
    });
  }
}

function assertCompletePriorityOrder(order: CriterionType[]): void {
  const allTypes = new Set(Object.values(CriterionType));
  const providedTypes = new Set(order);

  if (providedTypes.size !== order.length || providedTypes.size !== allTypes.size) {
    throw new Error('Priority order must include all criterion types exactly once');
  }

  for (const type of allTypes) {
    if (!providedTypes.has(type)) {
      throw new Error(`Missing criterion type: ${type}`);
    }
  }
}

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

export interface BusSettings {
  /** AMQP URL; when empty the in-process broker is used */
  rabbitmqUrl: string;
  exchange: string;
  publishTimeoutMs: number;
  handlerDeadlineMs: number;
  /** First delivery + one requeue */
  maxDeliveryAttempts: number;
  requeueBaseDelayMs: number;
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  prefetch: number;
}

export interface EnvironmentConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  serviceName: string;
  allowedOrigins: string[];
  bus: BusSettings;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;

/** Unset and empty variables both fall back to the default */
const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const text = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().default(fallback));

const EnvironmentSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(3003)),
  NODE_ENV: z.string().optional(),
  SERVICE_NAME: text('trip-service'),
  ALLOWED_ORIGINS: text('http://localhost:5173'),
  RABBITMQ_URL: text(''),
  EVENT_EXCHANGE: text('events'),
  PUBLISH_TIMEOUT_MS: positiveInt(5000),
  HANDLER_DEADLINE_MS: positiveInt(10000),
  REQUEUE_BASE_DELAY_MS: positiveInt(1000),
  RECONNECT_INITIAL_DELAY_MS: positiveInt(1000),
  RECONNECT_MAX_DELAY_MS: positiveInt(30000),
  PREFETCH: positiveInt(10)
});

/**
 * Read service settings from the environment.
 *
 * @throws Error naming every malformed variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    nodeEnv: NODE_ENVS.find(e => e === vars.NODE_ENV) || 'development',
    serviceName: vars.SERVICE_NAME,
    allowedOrigins: vars.ALLOWED_ORIGINS.split(','),
    bus: {
      rabbitmqUrl: vars.RABBITMQ_URL,
      exchange: vars.EVENT_EXCHANGE,
      publishTimeoutMs: vars.PUBLISH_TIMEOUT_MS,
      handlerDeadlineMs: vars.HANDLER_DEADLINE_MS,
      maxDeliveryAttempts: 2,
      requeueBaseDelayMs: vars.REQUEUE_BASE_DELAY_MS,
      reconnectInitialDelayMs: vars.RECONNECT_INITIAL_DELAY_MS,
      reconnectMaxDelayMs: vars.RECONNECT_MAX_DELAY_MS,
      prefetch: vars.PREFETCH
    }
  };
}
