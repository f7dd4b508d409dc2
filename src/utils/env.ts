import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Logger, loggerConfigFromEnv } from './logger';

/**
 * Loads a `.env` file into `process.env`, keeping values already set, and
 * applies its logging settings to the shared logger.
 * @returns false when the file could not be read
 */
export function loadEnvFile(filePath: string = path.join(process.cwd(), '.env')): boolean {
  const result = dotenv.config({ path: filePath });
  if (result.error) {
    return false;
  }
  Logger.getInstance(loggerConfigFromEnv());
  return true;
}

/**
 * Environment configuration: `process.env` overlaid on an optional `.env` file.
 */
export class EnvManager {
  private static instance: EnvManager | null = null;
  private env: Map<string, string> = new Map();
  private envFilePath?: string;
  private logger = Logger.getInstance();

  constructor(source: NodeJS.ProcessEnv = process.env, envFile: string = path.join(process.cwd(), '.env')) {
    this.loadEnvironment(source, envFile);
  }

  /**
   * Get the Environment singleton instance
   */
  public static getInstance(): EnvManager {
    if (!EnvManager.instance) {
      EnvManager.instance = new EnvManager();
    }
    return EnvManager.instance;
  }

  private loadEnvironment(source: NodeJS.ProcessEnv, envFile: string): void {
    // Values already in the environment win over the file
    if (fs.existsSync(envFile)) {
      this.loadEnvFile(envFile);
      this.envFilePath = envFile;
    }

    Object.entries(source).forEach(([key, value]) => {
      if (value !== undefined) {
        this.env.set(key, value);
      }
    });
  }

  private loadEnvFile(filePath: string): void {
    try {
      const parsed = dotenv.parse(fs.readFileSync(filePath));
      for (const [key, value] of Object.entries(parsed)) {
        this.env.set(key, value);
      }
      this.logger.debug(`Loaded environment from ${filePath}`, { envFile: filePath });
    } catch (error) {
      this.logger.warn(`Failed to load environment file ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Get an environment variable value
   * @param defaultValue returned when the key is not set
   */
  public get(key: string, defaultValue?: string): string | undefined {
    return this.env.get(key) ?? defaultValue;
  }

  public getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  }

  /**
   * Get an environment variable as a number
   * @returns the parsed integer, or `defaultValue` when unset or not numeric
   */
  public getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    const num = parseInt(value, 10);
    return isNaN(num) ? defaultValue : num;
  }

  public getEnvFilePath(): string | undefined {
    return this.envFilePath;
  }

  /**
   * Set an environment variable (memory only, does not modify .env file)
   */
  public set(key: string, value: string): void {
    this.env.set(key, value);
  }

  public has(key: string): boolean {
    return this.env.has(key);
  }
}
