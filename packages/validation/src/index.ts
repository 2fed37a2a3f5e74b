export * from './common.zod';
export * from './project.zod';
export * from './rfi.zod';
export * from './bim.zod';
export * from './cost.zod';
export * from './imports.zod';
export * from './documents.zod';
