import { z } from 'zod';
import type { Attributes, SpanLimits } from './types';
import { ConfigurationError } from './errors';
import { Resource } from './resource';
import type { IdGenerator } from './tracing/ids';
import type { SpanProcessor } from './tracing/processor';
import {
  alwaysOffSampler,
  alwaysOnSampler,
  parentBasedSampler,
  traceIdRatioSampler,
} from './tracing/sampler';
import type { Sampler } from './tracing/sampler';

/**
 * Spanline SDK configuration options
 */
export interface SpanlineOptions {
  /** Value of the `service.name` resource attribute */
  serviceName?: string;
  /** Sampler; takes precedence over tracesSampleRate */
  sampler?: Sampler;
  /** Sample rate for root spans (0.0 to 1.0); children follow their parent */
  tracesSampleRate?: number;
  idGenerator?: IdGenerator;
  /** Extra resource attributes */
  resource?: Attributes;
  spanLimits?: Partial<SpanLimits>;
  spanProcessors?: SpanProcessor[];
  /** Enable debug logging */
  debug?: boolean;
  /** Throw when a context guard is released twice */
  strictGuards?: boolean;
}

export interface NormalizedOptions {
  serviceName: string;
  sampler: Sampler;
  idGenerator?: IdGenerator;
  resource: Resource;
  spanLimits: SpanLimits;
  spanProcessors: SpanProcessor[];
  debug: boolean;
  strictGuards: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_SPAN_LIMITS: SpanLimits = {
  maxAttributes: 128,
  maxEvents: 128,
  maxLinks: 128,
};

const DEFAULT_SERVICE_NAME = 'unknown_service';

const limitSchema = z.number().int().nonnegative();

const spanLimitsSchema = z
  .object({
    maxAttributes: limitSchema,
    maxEvents: limitSchema,
    maxLinks: limitSchema,
  })
  .partial();

const optionsSchema = z.object({
  serviceName: z.string().min(1).optional(),
  tracesSampleRate: z.number().finite().optional(),
  debug: z.boolean().optional(),
  strictGuards: z.boolean().optional(),
  spanLimits: spanLimitsSchema.optional(),
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envLimit = z.coerce.number().int().nonnegative().optional();

const envSchema = z.object({
  SPANLINE_SERVICE_NAME: z.string().min(1).optional(),
  SPANLINE_TRACES_SAMPLER: z
    .enum([
      'always_on',
      'always_off',
      'traceidratio',
      'parentbased_always_on',
      'parentbased_always_off',
      'parentbased_traceidratio',
    ])
    .optional(),
  SPANLINE_TRACES_SAMPLER_ARG: z.coerce.number().min(0).max(1).optional(),
  SPANLINE_DEBUG: booleanFlag.optional(),
  SPANLINE_STRICT_GUARDS: booleanFlag.optional(),
  SPANLINE_SPAN_ATTRIBUTE_COUNT_LIMIT: envLimit,
  SPANLINE_SPAN_EVENT_COUNT_LIMIT: envLimit,
  SPANLINE_SPAN_LINK_COUNT_LIMIT: envLimit,
});

export interface EnvConfig {
  serviceName?: string;
  sampler?: Sampler;
  debug?: boolean;
  strictGuards?: boolean;
  spanLimits: Partial<SpanLimits>;
}

/**
 * Read SPANLINE_* environment variables
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment configuration: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }
  const vars = parsed.data;

  const spanLimits: Partial<SpanLimits> = {};
  if (vars.SPANLINE_SPAN_ATTRIBUTE_COUNT_LIMIT !== undefined) {
    spanLimits.maxAttributes = vars.SPANLINE_SPAN_ATTRIBUTE_COUNT_LIMIT;
  }
  if (vars.SPANLINE_SPAN_EVENT_COUNT_LIMIT !== undefined) {
    spanLimits.maxEvents = vars.SPANLINE_SPAN_EVENT_COUNT_LIMIT;
  }
  if (vars.SPANLINE_SPAN_LINK_COUNT_LIMIT !== undefined) {
    spanLimits.maxLinks = vars.SPANLINE_SPAN_LINK_COUNT_LIMIT;
  }

  return {
    serviceName: vars.SPANLINE_SERVICE_NAME,
    sampler: vars.SPANLINE_TRACES_SAMPLER
      ? samplerFromEnv(vars.SPANLINE_TRACES_SAMPLER, vars.SPANLINE_TRACES_SAMPLER_ARG ?? 1)
      : undefined,
    debug: vars.SPANLINE_DEBUG,
    strictGuards: vars.SPANLINE_STRICT_GUARDS,
    spanLimits,
  };
}

function samplerFromEnv(
  name: NonNullable<z.infer<typeof envSchema>['SPANLINE_TRACES_SAMPLER']>,
  ratio: number
): Sampler {
  switch (name) {
    case 'always_on':
      return alwaysOnSampler;
    case 'always_off':
      return alwaysOffSampler;
    case 'traceidratio':
      return traceIdRatioSampler(ratio);
    case 'parentbased_always_on':
      return parentBasedSampler(alwaysOnSampler);
    case 'parentbased_always_off':
      return parentBasedSampler(alwaysOffSampler);
    case 'parentbased_traceidratio':
      return parentBasedSampler(traceIdRatioSampler(ratio));
  }
}

/**
 * Validate span limits and fill in defaults
 */
export function resolveSpanLimits(limits?: Partial<SpanLimits>): SpanLimits {
  const parsed = spanLimitsSchema.safeParse(limits ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid span limits: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }
  return {
    maxAttributes: parsed.data.maxAttributes ?? DEFAULT_SPAN_LIMITS.maxAttributes,
    maxEvents: parsed.data.maxEvents ?? DEFAULT_SPAN_LIMITS.maxEvents,
    maxLinks: parsed.data.maxLinks ?? DEFAULT_SPAN_LIMITS.maxLinks,
  };
}

/**
 * Validate options and merge them over environment configuration and defaults.
 * Explicit options win over the environment.
 */
export function normalizeOptions(
  options: SpanlineOptions = {},
  env: Record<string, string | undefined> = process.env
): NormalizedOptions {
  const parsed = optionsSchema.safeParse({
    serviceName: options.serviceName,
    tracesSampleRate: options.tracesSampleRate,
    debug: options.debug,
    strictGuards: options.strictGuards,
    spanLimits: options.spanLimits,
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid options: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }
  const fromEnv = loadEnvConfig(env);

  const serviceName = options.serviceName ?? fromEnv.serviceName ?? DEFAULT_SERVICE_NAME;

  let sampler: Sampler;
  if (options.sampler) {
    sampler = options.sampler;
  } else if (options.tracesSampleRate !== undefined) {
    sampler = parentBasedSampler(traceIdRatioSampler(clampSampleRate(options.tracesSampleRate)));
  } else {
    sampler = fromEnv.sampler ?? parentBasedSampler(alwaysOnSampler);
  }

  return {
    serviceName,
    sampler,
    idGenerator: options.idGenerator,
    resource: Resource.default()
      .merge(new Resource({ 'service.name': serviceName }))
      .merge(new Resource(options.resource ?? {})),
    spanLimits: resolveSpanLimits({
      maxAttributes: options.spanLimits?.maxAttributes ?? fromEnv.spanLimits.maxAttributes,
      maxEvents: options.spanLimits?.maxEvents ?? fromEnv.spanLimits.maxEvents,
      maxLinks: options.spanLimits?.maxLinks ?? fromEnv.spanLimits.maxLinks,
    }),
    spanProcessors: options.spanProcessors ?? [],
    debug: options.debug ?? fromEnv.debug ?? false,
    strictGuards: options.strictGuards ?? fromEnv.strictGuards ?? false,
  };
}

/**
 * Clamp sample rate to valid range [0, 1]
 */
function clampSampleRate(rate: number): number {
  return Math.max(0, Math.min(rate, 1));
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}
