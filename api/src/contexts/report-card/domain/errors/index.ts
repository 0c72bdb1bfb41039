export * from './report-card.errors';
