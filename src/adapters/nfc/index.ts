export * from './nfc.module';
export * from './nfc-adapter.service';
export * from './type2-tag-reader';
