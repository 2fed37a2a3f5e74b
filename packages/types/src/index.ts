export * from './common';
export * from './project';
export * from './rfi';
export * from './bim';
export * from './cost';
export * from './imports';
export * from './documents';
