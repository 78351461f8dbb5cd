import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ConfigModule } from '@infra/config';
import { RestModule } from '@adapters/rest';
import { NfcModule } from '@adapters/nfc';
import { CoreModule } from '@core/core.module';

const mode = (process.env.MODE || 'API').toUpperCase();

@Module({
  imports: [
    // Global configuration
    ConfigModule,

    // Event emitter for registry events
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
    }),

    // Registry, scan orchestration, messaging
    CoreModule,

    // Adapters - conditionally loaded based on MODE
    ...(mode === 'API' || mode === 'IOT' ? [RestModule] : []),
    ...(mode === 'NFC' || mode === 'IOT' ? [NfcModule.register()] : []),
  ],
})
export class AppModule {}
