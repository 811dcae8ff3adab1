// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@objmutex/config-service';
import type { Logger } from 'pino';
import { createClient } from 'redis';

export type RedisClient = ReturnType<typeof createClient>;

export class RedisClientManager {
  private static client: RedisClient | undefined;
  private static connected: boolean = false;

  /**
   * Connection attempt in flight, shared by concurrent callers of {@link getClient}.
   */
  private static connecting: Promise<void> | undefined;

  public static async connect(client: RedisClient): Promise<void> {
    await client.connect();
    this.connected = true;
  }

  public static async disconnect(): Promise<void> {
    if (this.client && this.connected) {
      await this.client.quit();
    }
    this.client = undefined;
    this.connected = false;
  }

  public static isConnected(): boolean {
    return this.connected;
  }

  public static async getClient(logger: Logger, doConnect: boolean = true): Promise<RedisClient> {
    let client = this.client;
    if (!client) {
      const url = ConfigService.get('REDIS_URL');
      const reconnectDelayMs = ConfigService.get('REDIS_RECONNECT_DELAY_MS');

      client = createClient({
        url,
        socket: { reconnectStrategy: (retries: number) => retries * reconnectDelayMs },
      });

      client.on('ready', () => {
        logger.info(`Redis client connected to ${new URL(url).host}`);
      });

      client.on('end', () => {
        logger.info('Disconnected from Redis server!');
      });

      client.on('error', (error: unknown) => {
        logger.error(error, 'Error occurred with Redis connection');
      });

      this.client = client;
    }

    if (doConnect && !this.connected) {
      if (!this.connecting) {
        this.connecting = this.connect(client).finally(() => {
          this.connecting = undefined;
        });
      }
      await this.connecting;
    }

    return client;
  }
}
