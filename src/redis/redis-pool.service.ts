import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { StoreBackendError } from '../common/errors/store-backend.error';

export interface RedisPoolConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  keyPrefix: string;
  enabled: boolean;
}

export const REDIS_DEFAULTS = {
  HOST: 'localhost',
  PORT: 6379,
  DB: 0,
  KEY_PREFIX: 'mcp:',
} as const;

/**
 * Shared Redis connection used by the session and event stream stores
 * when `STORE_BACKEND=redis`.
 */
@Injectable()
export class RedisPoolService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisPoolService.name);
  private primaryClient: Redis | null = null;
  private readonly config: RedisPoolConfig;
  private isConnected = false;
  private connectionPromise: Promise<boolean> | null = null;

  constructor(@Optional() private readonly configService?: ConfigService) {
    const enabled = this.configService?.get<boolean | string>('REDIS_ENABLED', false);

    this.config = {
      host: this.configService?.get<string>('REDIS_HOST') ?? REDIS_DEFAULTS.HOST,
      port: this.configService?.get<number>('REDIS_PORT') ?? REDIS_DEFAULTS.PORT,
      password: this.configService?.get<string>('REDIS_PASSWORD') || undefined,
      db: this.configService?.get<number>('REDIS_DB') ?? REDIS_DEFAULTS.DB,
      keyPrefix:
        this.configService?.get<string>('REDIS_KEY_PREFIX') ?? REDIS_DEFAULTS.KEY_PREFIX,
      enabled: enabled === true || enabled === 'true',
    };
  }

  async onModuleInit(): Promise<void> {
    if (this.config.enabled) {
      await this.connect();
    } else {
      this.logger.log('Redis disabled via configuration');
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  /**
   * Returns the connected client or throws a StoreBackendError naming the
   * operation that needed it.
   */
  requireClient(operation: string): Redis {
    if (!this.isConnected || !this.primaryClient) {
      throw new StoreBackendError('redis', operation);
    }
    return this.primaryClient;
  }

  /**
   * Check if Redis is enabled and connected
   */
  isAvailable(): boolean {
    return this.config.enabled && this.isConnected && this.primaryClient !== null;
  }

  /**
   * Check if Redis is enabled in configuration
   */
  isEnabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Prefix shared by every key the stores write
   */
  getKeyPrefix(): string {
    return this.config.keyPrefix;
  }

  /**
   * Connect to Redis (idempotent - safe to call multiple times)
   */
  async connect(): Promise<boolean> {
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    if (this.isConnected && this.primaryClient) {
      return true;
    }

    if (!this.config.enabled) {
      return false;
    }

    this.connectionPromise = this.doConnect();
    const result = await this.connectionPromise;
    this.connectionPromise = null;
    return result;
  }

  private async doConnect(): Promise<boolean> {
    try {
      this.primaryClient = new Redis({
        host: this.config.host,
        port: this.config.port,
        password: this.config.password,
        db: this.config.db,
        lazyConnect: true,
        connectTimeout: 5000,
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) {
            return null; // Stop retrying
          }
          return Math.min(times * 200, 1000);
        },
        enableReadyCheck: true,
      });

      this.primaryClient.on('error', (err: Error) => {
        this.logger.error(`Redis pool error: ${err.message}`);
        this.isConnected = false;
      });

      this.primaryClient.on('connect', () => {
        this.isConnected = true;
      });

      this.primaryClient.on('close', () => {
        this.logger.warn('Redis pool connection closed');
        this.isConnected = false;
      });

      await this.primaryClient.connect();
      this.isConnected = true;
      this.logger.log(
        `Redis pool initialized: ${this.config.host}:${this.config.port}, db: ${this.config.db}`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to connect Redis pool: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.primaryClient = null;
      this.isConnected = false;
      return false;
    }
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.primaryClient) {
      try {
        await this.primaryClient.quit();
        this.logger.log('Redis pool disconnected');
      } catch (error) {
        this.logger.warn(
          `Error disconnecting Redis pool: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      } finally {
        this.primaryClient = null;
        this.isConnected = false;
      }
    }
  }

  /**
   * Check Redis health with a PING
   */
  async isHealthy(): Promise<boolean> {
    if (!this.primaryClient || !this.isConnected) {
      return false;
    }

    try {
      const result = await this.primaryClient.ping();
      return result === 'PONG';
    } catch (error) {
      this.logger.debug(
        `Redis ping failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }
}
