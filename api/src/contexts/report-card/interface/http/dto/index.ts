export * from './report-card.dto';
