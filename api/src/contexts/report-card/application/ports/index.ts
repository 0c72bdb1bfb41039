export * from './workbook-reader.port';
export * from './template-filler.port';
export * from './pdf-converter.port';
