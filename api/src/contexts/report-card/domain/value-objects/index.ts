export * from './column-address.vo';
export * from './field-mapping.vo';
export * from './field-dict.vo';
export * from './raw-table.vo';
export * from './run-report.vo';
