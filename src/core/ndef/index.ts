export * from './ndef.constants';
export * from './ndef-parser';
export * from './ndef-encoder';
