import { Global, LogLevel, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';

export type AppMode = 'API' | 'NFC' | 'IOT';

/**
 * Configuration interface matching .env structure
 */
export interface AppConfig {
  // Application
  MODE: AppMode;
  PORT: number;
  NODE_ENV: string;
  CORS_ORIGIN: string;

  // Logging
  LOG_LEVEL: LogLevel;

  // Registry
  DELETE_MODE: boolean;

  // NFC
  NFC_POLLING_INTERVAL: number;
  NFC_MAX_PAGE: number;

  // MQTT (Optional)
  MQTT_BROKER_URL?: string;
  MQTT_CLIENT_ID: string;
  MQTT_USERNAME?: string;
  MQTT_PASSWORD?: string;
  MQTT_TOPIC_PREFIX: string;
}

export const APP_CONFIG = Symbol('APP_CONFIG');

const MODES: readonly AppMode[] = ['API', 'NFC', 'IOT'];

/** Ordered from most to least severe */
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Levels enabled when `level` is the lowest one wanted
 */
export function logLevelsFrom(level: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

function isMode(value: string): value is AppMode {
  return MODES.some((mode) => mode === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseBoolean(value: string | undefined): boolean | null {
  if (value === undefined || value === '') return false;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return null;
}

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      cache: true,
    }),
  ],
  providers: [{ provide: APP_CONFIG, useFactory: () => ConfigModule.validate() }],
  exports: [APP_CONFIG],
})
export class ConfigModule {
  static validate(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const errors: string[] = [];

    // Basic validation
    const mode = (env.MODE || 'API').toUpperCase();
    const PORT = parseInt(env.PORT || '3000', 10);
    const NODE_ENV = env.NODE_ENV || 'development';
    const CORS_ORIGIN = env.CORS_ORIGIN || '*';

    if (!isMode(mode)) {
      errors.push(`MODE must be one of ${MODES.join(', ')}`);
    }

    if (isNaN(PORT) || PORT < 1 || PORT > 65535) {
      errors.push('PORT must be a number between 1 and 65535');
    }

    // Logging
    const logLevel = (env.LOG_LEVEL || 'log').toLowerCase();
    if (!isLogLevel(logLevel)) {
      errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }

    // Registry
    const DELETE_MODE = parseBoolean(env.DELETE_MODE);
    if (DELETE_MODE === null) {
      errors.push('DELETE_MODE must be true or false');
    }

    // NFC settings
    const NFC_POLLING_INTERVAL = parseInt(env.NFC_POLLING_INTERVAL || '250', 10);
    const NFC_MAX_PAGE = parseInt(env.NFC_MAX_PAGE || '20', 10);

    if (isNaN(NFC_POLLING_INTERVAL) || NFC_POLLING_INTERVAL < 10) {
      errors.push('NFC_POLLING_INTERVAL must be at least 10 (ms)');
    }

    if (isNaN(NFC_MAX_PAGE) || NFC_MAX_PAGE < 5 || NFC_MAX_PAGE > 256) {
      errors.push('NFC_MAX_PAGE must be between 5 and 256');
    }

    // Optional MQTT settings
    const MQTT_BROKER_URL = env.MQTT_BROKER_URL || undefined;
    if (MQTT_BROKER_URL && !/^(mqtts?|wss?|tcp|ssl):\/\//.test(MQTT_BROKER_URL)) {
      errors.push(`Invalid MQTT broker URL: ${MQTT_BROKER_URL}`);
    }

    // Throw errors if validation failed
    if (errors.length > 0 || !isMode(mode) || !isLogLevel(logLevel) || DELETE_MODE === null) {
      throw new Error(
        `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      );
    }

    return {
      MODE: mode,
      PORT,
      NODE_ENV,
      CORS_ORIGIN,
      LOG_LEVEL: logLevel,
      DELETE_MODE,
      NFC_POLLING_INTERVAL,
      NFC_MAX_PAGE,
      MQTT_BROKER_URL,
      MQTT_CLIENT_ID: env.MQTT_CLIENT_ID || 'building-registry',
      MQTT_USERNAME: env.MQTT_USERNAME || undefined,
      MQTT_PASSWORD: env.MQTT_PASSWORD || undefined,
      MQTT_TOPIC_PREFIX: env.MQTT_TOPIC_PREFIX || 'buildings',
    };
  }
}
