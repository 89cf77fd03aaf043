/**
 * Aggregation configuration loading
 *
 * Precedence, lowest first: built-in defaults, the optional JSON file
 * (AGGREGATION_CONFIG_PATH), environment variables. Environment overrides
 * apply to every source.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type {
  AggregationConfig,
  CanonicalFieldName,
  MergePriority,
  PriorityOrder,
  RetryPolicy,
  SourceConfig,
  SourceId,
} from "@/types";
import {
  CANONICAL_FIELDS,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_CAP_MS,
  DEFAULT_GLOBAL_DEADLINE_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MERGE_PRIORITY,
  DEFAULT_NON_RETRYABLE_KINDS,
  DEFAULT_RETRYABLE_KINDS,
  PRIORITY_FIELD_GROUPS,
} from "@/constants";
import { mapSources } from "@/aggregation/sourceMap";
import { ConfigError, errorMessage } from "@/errors";
import { failureKindSchema, priorityOrderSchema, sourceIdSchema } from "./schemas";
import * as logger from "@/logger";

const sourceOverrideSchema = z
  .object({
    enabled: z.boolean(),
    maxAttempts: z.number().int().min(1).max(10),
    attemptTimeoutMs: z.number().int().positive(),
    backoff: z
      .object({
        strategy: z.enum(["fixed", "exponential"]),
        baseMs: z.number().int().nonnegative(),
        capMs: z.number().int().nonnegative(),
        jitter: z.boolean(),
      })
      .partial(),
    retryableKinds: z.array(failureKindSchema),
    nonRetryableKinds: z.array(failureKindSchema),
  })
  .partial()
  .strict();

const configFileSchema = z
  .object({
    globalDeadlineMs: z.number().int().positive(),
    sources: z.record(sourceIdSchema, sourceOverrideSchema),
    priority: z
      .object({
        default: priorityOrderSchema,
        /** Keys are canonical field names or "group:<NAME>" */
        fields: z.record(z.string(), priorityOrderSchema),
      })
      .partial(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  GLOBAL_DEADLINE_MS: positiveInt.optional(),
  SOURCE_TIMEOUT_MS: positiveInt.optional(),
  SOURCE_MAX_ATTEMPTS: positiveInt.max(10).optional(),
  DISABLED_SOURCES: z.array(sourceIdSchema).optional(),
  AGGREGATION_CONFIG_PATH: z.string().optional(),
});

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  /** Overrides AGGREGATION_CONFIG_PATH */
  configPath?: string;
};

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function defaultRetryPolicy(): RetryPolicy {
  return {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    backoff: {
      strategy: "exponential",
      baseMs: DEFAULT_BACKOFF_BASE_MS,
      capMs: DEFAULT_BACKOFF_CAP_MS,
      jitter: true,
    },
    retryableKinds: [...DEFAULT_RETRYABLE_KINDS],
    nonRetryableKinds: [...DEFAULT_NON_RETRYABLE_KINDS],
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  };
}

/**
 * Built-in configuration: every source enabled, default policy and priority
 */
export function defaultAggregationConfig(): AggregationConfig {
  return {
    globalDeadlineMs: DEFAULT_GLOBAL_DEADLINE_MS,
    sources: mapSources(() => ({ enabled: true, policy: defaultRetryPolicy() })),
    priority: {
      default: [...DEFAULT_MERGE_PRIORITY.default],
      fields: { ...DEFAULT_MERGE_PRIORITY.fields },
    },
  };
}

/**
 * Expand a priority-field key into the canonical fields it names
 */
function resolveFieldKey(key: string): readonly CanonicalFieldName[] | null {
  if (key.startsWith("group:")) {
    const name = key.slice("group:".length);
    const group = Object.entries(PRIORITY_FIELD_GROUPS).find(([groupName]) => groupName === name);
    return group ? group[1] : null;
  }
  const field = CANONICAL_FIELDS.find((candidate) => candidate === key);
  return field ? [field] : null;
}

function applyPriority(base: MergePriority, file: ConfigFile["priority"]): MergePriority {
  if (!file) return base;

  const fields: Partial<Record<CanonicalFieldName, PriorityOrder>> = { ...base.fields };
  const unknown: string[] = [];

  // groups first so that a single-field entry wins over its group
  const keys = Object.keys(file.fields ?? {}).sort(
    (a, b) => Number(b.startsWith("group:")) - Number(a.startsWith("group:")),
  );
  for (const key of keys) {
    const order = file.fields?.[key];
    const resolved = resolveFieldKey(key);
    if (!resolved || !order) {
      unknown.push(key);
      continue;
    }
    for (const field of resolved) {
      fields[field] = order;
    }
  }

  if (unknown.length > 0) {
    throw new ConfigError(
      "Invalid merge priority",
      unknown.map((key) => `priority.fields.${key}: unknown field or group`),
    );
  }

  return { default: file.default ?? base.default, fields };
}

function applySourceOverride(
  base: SourceConfig,
  override: z.infer<typeof sourceOverrideSchema> | undefined,
): SourceConfig {
  if (!override) return base;
  return {
    enabled: override.enabled ?? base.enabled,
    policy: {
      maxAttempts: override.maxAttempts ?? base.policy.maxAttempts,
      attemptTimeoutMs: override.attemptTimeoutMs ?? base.policy.attemptTimeoutMs,
      backoff: { ...base.policy.backoff, ...override.backoff },
      retryableKinds: override.retryableKinds ?? base.policy.retryableKinds,
      nonRetryableKinds: override.nonRetryableKinds ?? base.policy.nonRetryableKinds,
    },
  };
}

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read aggregation config ${path}`, [errorMessage(err)]);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid aggregation config ${path}`, issuesOf(parsed.error));
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv) {
  // empty values mean "unset"
  const value = (name: string): string | undefined => {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  };
  const disabled = value("DISABLED_SOURCES");

  const parsed = envSchema.safeParse({
    GLOBAL_DEADLINE_MS: value("GLOBAL_DEADLINE_MS"),
    SOURCE_TIMEOUT_MS: value("SOURCE_TIMEOUT_MS"),
    SOURCE_MAX_ATTEMPTS: value("SOURCE_MAX_ATTEMPTS"),
    DISABLED_SOURCES: disabled
      ?.split(",")
      .map((source) => source.trim())
      .filter((source) => source.length > 0),
    AGGREGATION_CONFIG_PATH: value("AGGREGATION_CONFIG_PATH"),
  });
  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * Load and validate the aggregation configuration
 *
 * @throws {ConfigError} On unreadable files or invalid values
 */
export function loadAggregationConfig(options: LoadConfigOptions = {}): AggregationConfig {
  const env = readEnv(options.env ?? process.env);
  const base = defaultAggregationConfig();

  const configPath = options.configPath ?? env.AGGREGATION_CONFIG_PATH;
  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const disabled = new Set<SourceId>(env.DISABLED_SOURCES ?? []);
  const sources = mapSources((source) => {
    const merged = applySourceOverride(base.sources[source], file.sources?.[source]);
    return {
      enabled: merged.enabled && !disabled.has(source),
      policy: {
        ...merged.policy,
        maxAttempts: env.SOURCE_MAX_ATTEMPTS ?? merged.policy.maxAttempts,
        attemptTimeoutMs: env.SOURCE_TIMEOUT_MS ?? merged.policy.attemptTimeoutMs,
      },
    };
  });

  const config: AggregationConfig = {
    globalDeadlineMs: env.GLOBAL_DEADLINE_MS ?? file.globalDeadlineMs ?? base.globalDeadlineMs,
    sources,
    priority: applyPriority(base.priority, file.priority),
  };

  logger.debug("Aggregation config loaded", {
    configPath,
    globalDeadlineMs: config.globalDeadlineMs,
    disabled: [...disabled],
  });
  return config;
}

