export * from './value-normalizer';
export * from './field-formatters';
export * from './sheet-utils';
export * from './file-name';
export * from './fs-utils';
