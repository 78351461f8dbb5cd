import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as mqtt from 'mqtt';
import { APP_CONFIG, AppConfig } from '@infra/config';

/**
 * MQTT messaging service for IoT mode
 */
@Injectable()
export class MessagingService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MessagingService.name);
  private client: mqtt.MqttClient | null = null;
  private isConnected = false;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async onModuleInit() {
    if (this.config.MODE === 'IOT' && this.config.MQTT_BROKER_URL) {
      this.connect();
    }
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  /**
   * Connect to MQTT broker
   */
  connect() {
    const brokerUrl = this.config.MQTT_BROKER_URL;
    if (!brokerUrl) {
      this.logger.warn('MQTT broker URL not configured');
      return;
    }

    try {
      const client = mqtt.connect(brokerUrl, {
        clientId: this.config.MQTT_CLIENT_ID,
        username: this.config.MQTT_USERNAME,
        password: this.config.MQTT_PASSWORD,
        clean: true,
        reconnectPeriod: 5000,
      });

      client.on('connect', () => {
        this.isConnected = true;
        this.logger.log('Connected to MQTT broker');
      });

      client.on('error', (error) => {
        this.logger.error(`MQTT error: ${error.message}`, error.stack);
      });

      client.on('close', () => {
        if (this.isConnected) {
          this.logger.warn('Disconnected from MQTT broker');
        }
        this.isConnected = false;
      });

      this.client = client;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to connect to MQTT broker: ${err.message}`, err.stack);
    }
  }

  /**
   * Topic for a building event, e.g. "buildings/added"
   */
  topic(suffix: string): string {
    return `${this.config.MQTT_TOPIC_PREFIX}/${suffix}`;
  }

  /**
   * Publish message to a topic. Skipped while disconnected.
   * @returns whether the broker acknowledged the message
   */
  async publish(topic: string, message: unknown): Promise<boolean> {
    const client = this.client;
    if (!client || !this.isConnected) {
      this.logger.debug(`MQTT client not connected, skipping publish to ${topic}`);
      return false;
    }

    const payload = typeof message === 'string' ? message : JSON.stringify(message);

    await new Promise<void>((resolve, reject) => {
      client.publish(topic, payload, { qos: 1 }, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.logger.debug(`Published message to topic: ${topic}`);
    return true;
  }

  /**
   * Disconnect from MQTT broker
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }

    await new Promise<void>((resolve) => {
      client.end(false, {}, () => {
        this.isConnected = false;
        this.logger.log('Disconnected from MQTT broker');
        resolve();
      });
    });
    this.client = null;
  }

  /**
   * Get connection status
   */
  getStatus() {
    return {
      isConnected: this.isConnected,
      brokerUrl: this.config.MQTT_BROKER_URL ?? null,
    };
  }
}
