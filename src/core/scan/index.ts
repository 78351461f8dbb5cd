export * from './tag-session';
export * from './scan-result';
export * from './buffer-tag-session';
export * from './type2-tag-session';
export * from './scan-orchestrator.service';
