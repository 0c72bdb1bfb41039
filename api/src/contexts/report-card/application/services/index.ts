export * from './mapping-loader.service';
export * from './student-sheet.service';
export * from './report-card-validator.service';
export * from './report-card-generator.service';
export * from './record-processor';
