import { DynamicModule, Module, Provider } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '@infra/config';
import { TAG_READER, TagReader } from '@core/scan';
import { NfcAdapterService } from './nfc-adapter.service';
import { Type2TagReader, Type2TransportSource } from './type2-tag-reader';

export interface NfcModuleOptions {
  /** A complete reader implementation */
  reader?: TagReader;
  /** Or a Type 2 card selector; pages are read up to NFC_MAX_PAGE */
  selectType2Card?: Type2TransportSource;
}

@Module({})
export class NfcModule {
  /**
   * Without a reader or card selector the adapter loads but does not poll
   */
  static register(options: NfcModuleOptions = {}): DynamicModule {
    const providers: Provider[] = [NfcAdapterService];
    const { reader, selectType2Card } = options;

    if (reader) {
      providers.push({ provide: TAG_READER, useValue: reader });
    } else if (selectType2Card) {
      providers.push({
        provide: TAG_READER,
        useFactory: (config: AppConfig) =>
          new Type2TagReader(selectType2Card, { maxPage: config.NFC_MAX_PAGE }),
        inject: [APP_CONFIG],
      });
    }

    return {
      module: NfcModule,
      providers,
      exports: [NfcAdapterService],
    };
  }
}
