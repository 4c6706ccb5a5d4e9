export * from './block-out-spans';
export * from './calendar-events';
export * from './calendar-markers';
export * from './calendar-pipeline';
export * from './calendar-store';
export * from './day-key';
export * from './errors';
export * from './month-event-cache';
export * from './schemas';
export * from './time-of-day';
