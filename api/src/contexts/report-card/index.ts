export * from './report-card.module';
export * from './config/report-card.config';
export * from './application/services';
export * from './application/ports';
export * from './domain/errors';
export * from './domain/value-objects';
