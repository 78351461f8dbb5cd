export * from './building-events';
export * from './building-events.service';
export * from './building-event-processor.service';
