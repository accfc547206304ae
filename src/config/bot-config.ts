import Joi from 'joi';

/**
 * Raw environment as accepted by the schema, after Joi conversion
 */
interface EnvironmentVariables {
  NODE_ENV: 'development' | 'production' | 'staging' | 'test';
  TELEGRAM_BOT_TOKEN: string;
  ALLOWED_USERS: string;
  APP_LOGS_MAP: string;
  APPS_LABEL_SELECTOR: string;
  MAIN_CONTAINER_PREFIX: string;
  METRICS_ENABLED: boolean;
  METRICS_PORT: number;
  KUBECONFIG_PATH: string;
  KUBE_CONTEXT: string;
}

/**
 * Environment variable validation schema for the bot
 */
const environmentSchema = Joi.object<EnvironmentVariables>({
  // ====================================
  // APPLICATION CONFIGURATION
  // ====================================
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'staging', 'test')
    .default('development')
    .description('Node.js environment mode'),

  // ====================================
  // TELEGRAM CONFIGURATION (REQUIRED)
  // ====================================
  TELEGRAM_BOT_TOKEN: Joi.string()
    .required()
    .messages({
      'any.required': 'TELEGRAM_BOT_TOKEN environment variable is not set',
      'string.empty': 'TELEGRAM_BOT_TOKEN environment variable is not set',
    })
    .description('Bot token issued by BotFather'),

  ALLOWED_USERS: Joi.string()
    .required()
    .pattern(/^\s*-?\d+\s*(,\s*-?\d+\s*)*$/)
    .messages({
      'any.required': 'ALLOWED_USERS environment variable is not set',
      'string.empty': 'ALLOWED_USERS environment variable is not set',
      'string.pattern.base': 'ALLOWED_USERS must be a comma-separated list of integers',
    })
    .description('Comma-separated Telegram user ids allowed to use the bot'),

  APP_LOGS_MAP: Joi.string()
    .allow('')
    .default('')
    .description('JSON object mapping application names to log links'),

  // ====================================
  // CLUSTER CONFIGURATION
  // ====================================
  APPS_LABEL_SELECTOR: Joi.string()
    .default('tgops=true')
    .description('Label selector for pods listed by /apps'),

  MAIN_CONTAINER_PREFIX: Joi.string()
    .default('main-')
    .description('Name prefix of the container whose image /apps reports'),

  KUBECONFIG_PATH: Joi.string()
    .allow('')
    .default('')
    .description('Custom kubeconfig path (empty for default discovery)'),

  KUBE_CONTEXT: Joi.string()
    .allow('')
    .default('')
    .description('Kubeconfig context to use (empty for current context)'),

  // ====================================
  // METRICS CONFIGURATION
  // ====================================
  METRICS_ENABLED: Joi.boolean()
    .default(true)
    .description('Serve Prometheus metrics over HTTP'),

  METRICS_PORT: Joi.number()
    .integer()
    .min(1)
    .max(65535)
    .default(8000)
    .description('Port of the metrics server'),
}).required();

const logsMapSchema = Joi.object<Record<string, string>>().pattern(
  Joi.string(),
  Joi.string().uri({ scheme: ['http', 'https'] }),
);

interface ValidationResult {
  isValid: boolean;
  config?: ValidatedConfig;
  errors?: string[];
  warnings?: string[];
}

export interface ValidatedConfig {
  nodeEnv: string;
  telegram: {
    token: string;
    allowedUserIds: number[];
  };
  cluster: {
    appsLabelSelector: string;
    mainContainerPrefix: string;
    kubeconfigPath?: string;
    context?: string;
  };
  logLinks: Record<string, string>;
  metrics: {
    enabled: boolean;
    port: number;
  };
}

function parseLogsMap(raw: string, warnings: string[]): Record<string, string> {
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    warnings.push(`Failed to parse APP_LOGS_MAP: ${error instanceof Error ? error.message : String(error)}`);
    warnings.push('Expected format: \'{"app1":"https://logs-link","app2":"https://another-link"}\'');
    return {};
  }

  const { error, value } = logsMapSchema.validate(parsed);
  if (error) {
    warnings.push(`Ignoring APP_LOGS_MAP: ${error.message}`);
    return {};
  }

  const links: Record<string, string> = {};
  for (const [name, url] of Object.entries(value)) {
    if (typeof url === 'string') links[name] = url;
  }
  return links;
}

/**
 * Bot configuration loaded from environment variables and validated with Joi
 */
export class BotConfig {
  private constructor(private readonly validatedConfig: ValidatedConfig) {}

  /**
   * @throws {Error} When validation fails, listing every offending variable
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): BotConfig {
    const result = this.validateEnvironment(env);

    if (!result.isValid || !result.config) {
      const errorMessage = [
        '❌ Environment variable validation failed:',
        '',
        ...(result.errors || []).map((error) => `  • ${error}`),
        '',
        '💡 Check your .env file and ensure all required variables are properly set.',
        '📖 See .env.example for valid configuration examples.',
      ].join('\n');

      throw new Error(errorMessage);
    }

    if (result.warnings && result.warnings.length > 0) {
      console.warn('⚠️  Configuration warnings:');
      result.warnings.forEach((warning) => console.warn(`  • ${warning}`));
    }

    console.log('✅ Environment configuration validated successfully');
    console.log(`👥 Authorized users: ${result.config.telegram.allowedUserIds.join(', ')}`);
    console.log(`📋 Loaded logs map for ${Object.keys(result.config.logLinks).length} applications`);

    return new BotConfig(result.config);
  }

  private static validateEnvironment(env: NodeJS.ProcessEnv): ValidationResult {
    const { error, value } = environmentSchema.validate(env, {
      allowUnknown: true,
      stripUnknown: false,
      abortEarly: false,
      convert: true,
    });

    if (error) {
      return {
        isValid: false,
        errors: error.details.map((detail) => `${detail.path.join('.')}: ${detail.message}`),
      };
    }

    const warnings: string[] = [];

    const config: ValidatedConfig = {
      nodeEnv: value.NODE_ENV,
      telegram: {
        token: value.TELEGRAM_BOT_TOKEN,
        allowedUserIds: value.ALLOWED_USERS.split(',').map((id) => Number.parseInt(id.trim(), 10)),
      },
      cluster: {
        appsLabelSelector: value.APPS_LABEL_SELECTOR,
        mainContainerPrefix: value.MAIN_CONTAINER_PREFIX,
        kubeconfigPath: value.KUBECONFIG_PATH || undefined,
        context: value.KUBE_CONTEXT || undefined,
      },
      logLinks: parseLogsMap(value.APP_LOGS_MAP, warnings),
      metrics: {
        enabled: value.METRICS_ENABLED,
        port: value.METRICS_PORT,
      },
    };

    return {
      isValid: true,
      config,
      warnings: warnings.length > 0 ? warnings : undefined,
    };
  }

  getTelegramConfig() {
    return this.validatedConfig.telegram;
  }

  getClusterConfig() {
    return this.validatedConfig.cluster;
  }

  getLogLinks(): Record<string, string> {
    return { ...this.validatedConfig.logLinks };
  }

  getMetricsConfig() {
    return this.validatedConfig.metrics;
  }

  getAppConfig() {
    return {
      nodeEnv: this.validatedConfig.nodeEnv,
    };
  }
}
