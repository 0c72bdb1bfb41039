export * from './report-card.controller';
