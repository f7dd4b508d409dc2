import { DatabaseConfig } from '../db/database.interface';

const CHARSET_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Validates database connection settings
 */
export class ConfigValidator {
  static validateCredentials(config: DatabaseConfig): string[] {
    const issues: string[] = [];

    if (!config.host.trim()) {
      issues.push('Host must not be empty');
    }
    if (!config.username.trim()) {
      issues.push('Username must not be empty');
    }
    if (!config.database.trim()) {
      issues.push('Database name must not be empty');
    }

    return issues;
  }

  static validateConnection(config: DatabaseConfig): string[] {
    const issues: string[] = [];

    if (!CHARSET_PATTERN.test(config.charset)) {
      issues.push(`Invalid character set name: "${config.charset}"`);
    }

    if (config.port !== undefined && (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)) {
      issues.push(`Port out of range: ${config.port}`);
    }

    return issues;
  }

  /**
   * Run all validations
   */
  static validate(config: DatabaseConfig): { valid: boolean; issues: string[] } {
    const allIssues = [...this.validateCredentials(config), ...this.validateConnection(config)];
    return {
      valid: allIssues.length === 0,
      issues: allIssues
    };
  }
}
