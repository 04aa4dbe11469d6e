import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type Stage = 'dev' | 'stage' | 'prod';

export type InferenceProvider = 'stub' | 'anthropic' | 'openai';

export type DatabaseDriver = 'postgres' | 'better-sqlite3';

const STAGES: readonly Stage[] = ['dev', 'stage', 'prod'];
const PROVIDERS: readonly InferenceProvider[] = ['stub', 'anthropic', 'openai'];
const DRIVERS: readonly DatabaseDriver[] = ['postgres', 'better-sqlite3'];

/**
 * GovernanceConfig
 *
 * Centralized, read-only configuration for request governance, the daily
 * spend cap and asynchronous action dispatch.
 *
 * Every knob is resolved through ConfigService (environment or .env) with a
 * safe default. Malformed numbers fall back to the default with a warning;
 * an unknown STAGE fails fast because it selects the spend ledger key and
 * the routing attributes of every published action.
 */
@Injectable()
export class GovernanceConfig {
  private readonly logger = new Logger(GovernanceConfig.name);

  /**
   * Deployment stage
   * Default: dev
   */
  readonly stage: Stage;

  /**
   * Sustained model call rate per process (token bucket capacity)
   * Default: 30 requests per minute
   */
  readonly requestsPerMinute: number;

  /**
   * How long a caller waits for a rate limiter token before giving up
   * Default: 30000 (30 seconds)
   */
  readonly rateLimitAcquireTimeoutMs: number;

  /**
   * Attempts made by the provider SDK itself (first call + SDK retries)
   * Default: 10
   */
  readonly transportMaxAttempts: number;

  /**
   * Provider SDK request timeout
   * Default: 120000 (2 minutes)
   */
  readonly transportTimeoutMs: number;

  /**
   * Application-level retries for throttling errors, on top of the SDK
   * Default: 5 retries, 1s base delay, 30s max delay
   */
  readonly throttleMaxRetries: number;
  readonly throttleBaseDelayMs: number;
  readonly throttleMaxDelayMs: number;

  /**
   * Daily spend cap in USD, shared by every process of the stage
   * Default: 5.00
   */
  readonly dailySpendCapUsd: number;

  /**
   * Model pricing per 1,000 tokens in USD
   * Default: 0.003 input, 0.015 output
   */
  readonly inputPricePer1kUsd: number;
  readonly outputPricePer1kUsd: number;

  readonly provider: InferenceProvider;
  readonly anthropicApiKey: string | undefined;
  readonly openaiApiKey: string | undefined;
  readonly modelId: string | undefined;
  readonly modelTemperature: number;
  readonly modelMaxTokens: number;

  readonly awsRegion: string;
  readonly webActionsTopicArn: string | undefined;
  readonly notificationsTopicArn: string | undefined;
  readonly responseQueueUrl: string | undefined;

  /**
   * Overall window a conversation turn waits for action responses
   * Default: 30000 (30 seconds)
   */
  readonly responsePollTimeoutMs: number;

  /**
   * Messages per receive call (SQS allows 1-10)
   * Default: 10
   */
  readonly responsePollMaxMessages: number;

  /**
   * Long-poll wait per receive call (SQS allows 0-20 seconds)
   * Default: 5
   */
  readonly responsePollWaitSeconds: number;

  /**
   * Model invocations allowed within one conversation turn
   * Default: 5
   */
  readonly agentMaxIterations: number;

  readonly databaseDriver: DatabaseDriver;

  constructor(private readonly configService: ConfigService) {
    this.stage = this.parseEnum('STAGE', STAGES, 'dev', true);

    // Rate limiter
    this.requestsPerMinute = this.parseEnvInt(
      'RATE_LIMIT_REQUESTS_PER_MINUTE',
      30, // 30 calls per minute
    );
    this.rateLimitAcquireTimeoutMs = this.parseEnvInt(
      'RATE_LIMIT_ACQUIRE_TIMEOUT_MS',
      30000, // 30 seconds
    );

    // Provider transport
    this.transportMaxAttempts = Math.max(
      1,
      this.parseEnvInt('TRANSPORT_MAX_ATTEMPTS', 10),
    );
    this.transportTimeoutMs = this.parseEnvInt(
      'TRANSPORT_TIMEOUT_MS',
      120000, // 2 minutes
    );

    // Throttle backoff
    this.throttleMaxRetries = Math.max(
      0,
      this.parseEnvInt('THROTTLE_MAX_RETRIES', 5),
    );
    this.throttleBaseDelayMs = this.parseEnvInt(
      'THROTTLE_BASE_DELAY_MS',
      1000, // 1 second
    );
    this.throttleMaxDelayMs = this.parseEnvInt(
      'THROTTLE_MAX_DELAY_MS',
      30000, // 30 seconds
    );

    // Spend cap and pricing
    this.dailySpendCapUsd = this.parseEnvFloat('DAILY_SPEND_CAP_USD', 5.0);
    this.inputPricePer1kUsd = this.parseEnvFloat(
      'INPUT_PRICE_PER_1K_TOKENS_USD',
      0.003,
    );
    this.outputPricePer1kUsd = this.parseEnvFloat(
      'OUTPUT_PRICE_PER_1K_TOKENS_USD',
      0.015,
    );

    // Model provider
    this.provider = this.parseEnum('AI_PROVIDER', PROVIDERS, 'stub', false);
    this.anthropicApiKey = this.optionalString('ANTHROPIC_API_KEY');
    this.openaiApiKey = this.optionalString('OPENAI_API_KEY');
    this.modelId = this.optionalString('MODEL_ID');
    this.modelTemperature = this.parseEnvFloat('MODEL_TEMPERATURE', 0);
    this.modelMaxTokens = this.parseEnvInt('MODEL_MAX_TOKENS', 4096);

    // Message bus
    this.awsRegion = this.optionalString('AWS_REGION') ?? 'us-east-1';
    this.webActionsTopicArn = this.optionalString('WEB_ACTIONS_TOPIC_ARN');
    this.notificationsTopicArn = this.optionalString('NOTIFICATIONS_TOPIC_ARN');
    this.responseQueueUrl = this.optionalString('AGENT_RESPONSE_QUEUE_URL');

    this.responsePollTimeoutMs = this.parseEnvInt(
      'RESPONSE_POLL_TIMEOUT_MS',
      30000, // 30 seconds
    );
    this.responsePollMaxMessages = clamp(
      this.parseEnvInt('RESPONSE_POLL_MAX_MESSAGES', 10),
      1,
      10,
    );
    this.responsePollWaitSeconds = clamp(
      this.parseEnvInt('RESPONSE_POLL_WAIT_SECONDS', 5),
      0,
      20,
    );

    this.agentMaxIterations = Math.max(
      1,
      this.parseEnvInt('AGENT_MAX_ITERATIONS', 5),
    );

    this.databaseDriver = this.parseEnum(
      'DATABASE_DRIVER',
      DRIVERS,
      'better-sqlite3',
      false,
    );

    this.logger.log(
      `Governance config loaded: stage=${this.stage}, provider=${this.provider}, ` +
        `rpm=${this.requestsPerMinute}, ` +
        `dailyCap=$${this.dailySpendCapUsd.toFixed(2)}, ` +
        `throttleRetries=${this.throttleMaxRetries}, ` +
        `transportAttempts=${this.transportMaxAttempts}`,
    );
  }

  /**
   * Spend ledger record key, one per stage
   */
  get spendTrackerKey(): string {
    return `spend_tracker_${this.stage}`;
  }

  /**
   * Read a raw string value (empty strings count as unset)
   */
  optionalString(key: string): string | undefined {
    const value = this.configService.get<string>(key);
    if (value === undefined || value === null) {
      return undefined;
    }
    const trimmed = String(value).trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  /**
   * Parse environment variable as integer with fallback to default
   */
  private parseEnvInt(key: string, defaultValue: number): number {
    const value = this.optionalString(key);

    if (!value) {
      return defaultValue;
    }

    const parsed = parseInt(value, 10);

    if (isNaN(parsed)) {
      this.logger.warn(`Invalid ${key}="${value}", using default: ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }

  /**
   * Parse environment variable as float with fallback to default
   */
  private parseEnvFloat(key: string, defaultValue: number): number {
    const value = this.optionalString(key);

    if (!value) {
      return defaultValue;
    }

    const parsed = parseFloat(value);

    if (isNaN(parsed)) {
      this.logger.warn(`Invalid ${key}="${value}", using default: ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }

  private parseEnum<T extends string>(
    key: string,
    allowed: readonly T[],
    defaultValue: T,
    strict: boolean,
  ): T {
    const value = this.optionalString(key);

    if (!value) {
      return defaultValue;
    }

    const match = allowed.find((candidate) => candidate === value);
    if (match) {
      return match;
    }

    if (strict) {
      throw new Error(
        `Invalid ${key} value: ${value} (must be ${allowed.join(', ')})`,
      );
    }

    this.logger.warn(`Invalid ${key}="${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
