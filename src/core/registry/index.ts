export * from './building-card';
export * from './building-registry.service';
