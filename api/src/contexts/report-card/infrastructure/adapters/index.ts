export * from './spreadsheet-reader.adapter';
export * from './docx-template-filler.adapter';
export * from './libreoffice-converter.adapter';
export * from './process-runner';
