/**
 * Configuration Validator
 *
 * Reports missing keys at startup. Nothing here is fatal: without a Google key
 * hunts fall back to curated stores, without an OpenAI key info answers fall
 * back to the apology response.
 */

import { logger } from '../logger/structured-logger.js';
import type { AppConfig } from '../../config/env.js';

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
}

export class ConfigValidator {
  validate(config: AppConfig): ValidationResult {
    const warnings: string[] = [];

    if (!config.googleApiKey) {
      warnings.push('GOOGLE_API_KEY is not set: hunts will use curated stores only');
    }
    if (config.llmProvider === 'openai' && !config.openaiApiKey) {
      warnings.push('OPENAI_API_KEY is not set: info answers will fall back to the apology response');
    }
    if (config.nodeEnv === 'production' && warnings.length > 0) {
      warnings.push('Running in production with degraded collaborators');
    }

    return { valid: warnings.length === 0, warnings };
  }

  /** Validate and log each warning */
  report(config: AppConfig): ValidationResult {
    const result = this.validate(config);
    for (const warning of result.warnings) {
      logger.warn({ event: 'config_warning' }, `[Config] ${warning}`);
    }
    if (result.valid) {
      logger.info({ event: 'config_ok' }, '[Config] All collaborators configured');
    }
    return result;
  }
}

export const configValidator = new ConfigValidator();
